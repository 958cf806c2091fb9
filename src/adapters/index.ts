export { runCommand, expandArgv, type CommandRunner, type CommandResult } from './command-runner.js';
export { CommandCapture, NoopCapture, type CommandCaptureConfig } from './capture/command-capture.js';
export {
  VisionClassifier,
  createVisionClassifier,
  parseClassifierText,
  type VisionClassifierConfig,
} from './classifier/vision-classifier.js';
export { RcloneUpload, createRcloneUpload, type RcloneUploadConfig } from './transport/rclone-upload.js';
export {
  TelegramNotify,
  isRetryableTelegramError,
  type TelegramNotifyConfig,
  type TelegramSender,
} from './transport/telegram-notify.js';
