import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DateTime } from 'luxon';
import type { CapturePort, Clock } from '../../ports/index.js';
import type { Logger } from '../../types/index.js';
import { errorMessage } from '../../core/errors.js';
import { expandArgv, runCommand, type CommandRunner } from '../command-runner.js';

export interface CommandCaptureConfig {
  /** argv template; `{output}` and `{camera}` are substituted */
  command: string[];
  /** Camera indexes, one still per camera */
  cameras: number[];
  /** Directory for captured stills */
  photoDir: string;
  timeoutMs: number;
}

/**
 * Takes one still per configured camera by running a capture command
 * (rpicam-still, fswebcam, ...). Files are named
 * `YYYYMMDD_HHmmss_<tagId>_cam<N>.jpg`.
 */
export class CommandCapture implements CapturePort {
  private readonly logger: Logger;

  constructor(
    private readonly config: CommandCaptureConfig,
    private readonly clock: Clock,
    logger: Logger,
    private readonly run: CommandRunner = runCommand
  ) {
    this.logger = logger.child({ component: 'capture' });
  }

  async capture(tagId: string): Promise<string[]> {
    try {
      await mkdir(this.config.photoDir, { recursive: true });
    } catch (error) {
      this.logger.error(
        { photoDir: this.config.photoDir, error: errorMessage(error) },
        'Photo directory unavailable'
      );
      return [];
    }

    const stamp = DateTime.fromMillis(this.clock.now()).toFormat('yyyyLLdd_HHmmss');
    const paths: string[] = [];

    for (const camera of this.config.cameras) {
      const output = join(this.config.photoDir, `${stamp}_${tagId}_cam${String(camera)}.jpg`);
      const argv = expandArgv(this.config.command, { output, camera: String(camera) });
      const result = await this.run(argv, { timeoutMs: this.config.timeoutMs });

      if (result.ok) {
        paths.push(output);
      } else {
        this.logger.warn(
          { tagId, camera, errorCode: result.errorCode, error: result.message },
          'Capture failed'
        );
      }
    }

    this.logger.debug({ tagId, captured: paths.length }, 'Capture finished');
    return paths;
  }
}

/**
 * Capture stand-in for setups without a camera.
 */
export class NoopCapture implements CapturePort {
  capture(_tagId: string): Promise<string[]> {
    return Promise.resolve([]);
  }
}
