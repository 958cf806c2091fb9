import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { MergedConfig } from './config-schema.js';
import { CONFIG_FILE_VERSION, configFileSchema, logLevelSchema } from './config-schema.js';
import { ConfigError } from '../core/errors.js';

export const CONFIG_FILE_NAME = 'chipwatch.json';

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets, deployment paths)
 * 2. Config file (data/config/chipwatch.json)
 * 3. Schema defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: unknown = null;
  private readonly warnings: string[] = [];

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load, validate and merge configuration from all sources.
   * @throws ConfigError when the file is unreadable or invalid
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const parsed = configFileSchema.safeParse(this.loadedConfig ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
      throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}:\n${issues}`);
    }

    const config = parsed.data;
    if (config.version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version ${String(config.version)} is newer than supported ` +
          `(${String(CONFIG_FILE_VERSION)})`
      );
    }

    this.mergeEnvironment(config);
    return config;
  }

  /**
   * Raw config file contents (for debugging).
   */
  getLoadedConfigFile(): unknown {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found while loading. Logged once the logger exists.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<unknown> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read ${filePath}: ${message}`);
    }

    try {
      return JSON.parse(content) as unknown;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to parse ${filePath}: ${message}`);
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const env = this.env;

    // Secrets (always prefer env)
    const apiKey = env['OPENAI_API_KEY'];
    if (apiKey) {
      config.classifier.apiKey = apiKey;
    }

    const baseUrl = env['OPENAI_BASE_URL'];
    if (baseUrl) {
      config.classifier.baseUrl = baseUrl;
    }

    const model = env['CLASSIFIER_MODEL'];
    if (model) {
      config.classifier.model = model;
    }

    const botToken = env['TELEGRAM_BOT_TOKEN'];
    if (botToken) {
      config.telegram.botToken = botToken;
    }

    const chatIds = env['TELEGRAM_CHAT_IDS'];
    if (chatIds) {
      config.telegram.chatIds = chatIds
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0);
    }

    const port = env['READER_PORT'];
    if (port) {
      config.reader.port = port;
    }

    const remote = env['RCLONE_REMOTE'];
    if (remote !== undefined) {
      config.upload.rcloneRemote = remote;
    }

    const lostTags = env['LOST_TAG_IDS'];
    if (lostTags) {
      config.pipeline.lostTagIds = lostTags
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0);
    }

    const digestThreshold = z.coerce.number().int().nonnegative().safeParse(env['DIGEST_THRESHOLD']);
    if (env['DIGEST_THRESHOLD'] && digestThreshold.success) {
      config.delivery.digestThreshold = digestThreshold.data;
    }

    const logLevel = logLevelSchema.safeParse(env['LOG_LEVEL']);
    if (logLevel.success) {
      config.logging.level = logLevel.data;
    }

    // Data paths
    const dataPath = env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
      config.paths.state = join(dataPath, 'state');
      config.paths.logs = join(dataPath, 'logs');
      config.paths.backup = join(dataPath, 'backup');
      config.logging.logDir = config.paths.logs;
      config.capture.photoDir = join(dataPath, 'photos');
    }
  }
}

export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
