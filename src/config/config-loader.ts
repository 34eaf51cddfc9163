import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodError } from 'zod';
import type { RuntimeConfig } from './config-schema.js';
import { CONFIG_FILE_VERSION, logLevelSchema, runtimeConfigSchema } from './config-schema.js';
import { ConfigError, errorMessage } from '../core/errors.js';

export const CONFIG_FILE_NAME = 'runtime.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets, paths, log level)
 * 2. Config file (data/config/runtime.json)
 * 3. Schema defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: unknown = null;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    const dataPath = env['DATA_PATH'];
    this.configPath = configPath ?? (dataPath ? join(dataPath, 'config') : 'data/config');
    this.env = env;
  }

  async load(): Promise<RuntimeConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const parsed = runtimeConfigSchema.safeParse(this.loadedConfig ?? {});
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${formatIssues(parsed.error)}`);
    }
    const config = parsed.data;

    if (config.version > CONFIG_FILE_VERSION) {
      // eslint-disable-next-line no-console
      console.warn(
        `Config file version (${String(config.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    this.mergeEnvironment(config);
    this.checkPipeline(config);
    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): unknown {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<unknown> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // No file: defaults apply
        return null;
      }
      throw new ConfigError(`Failed to load config file: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const raw: unknown = JSON.parse(content);
      return raw;
    } catch (error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
  }

  private mergeEnvironment(config: RuntimeConfig): void {
    const openRouterKey = this.env['OPENROUTER_API_KEY'];
    if (openRouterKey) {
      config.llm.openRouterApiKey = openRouterKey;
    }

    const baseUrl = this.env['LLM_BASE_URL'];
    if (baseUrl) {
      config.llm.baseUrl = baseUrl;
    }

    const model = this.env['LLM_MODEL'];
    if (model) {
      config.llm.model = model;
    }

    const logLevel = logLevelSchema.safeParse(this.env['LOG_LEVEL']);
    if (logLevel.success) {
      config.logging.level = logLevel.data;
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
      config.paths.state = join(dataPath, 'state');
      config.logging.logDir = join(dataPath, 'logs');
    }

    const ingress = this.env['INGRESS_SOCKET'];
    if (ingress) {
      if (/^\d+$/.test(ingress)) {
        config.ingress.port = Number(ingress);
        config.ingress.socketPath = null;
      } else {
        config.ingress.socketPath = ingress;
      }
    }
  }

  /**
   * Cross-field checks the schema cannot express.
   */
  private checkPipeline(config: RuntimeConfig): void {
    const names = new Set<string>();
    for (const distiller of config.distillers) {
      if (names.has(distiller.name)) {
        throw new ConfigError(`Duplicate distiller name "${distiller.name}"`);
      }
      names.add(distiller.name);
    }
    for (const distiller of config.distillers) {
      if (distiller.feedback !== undefined && !names.has(distiller.feedback)) {
        throw new ConfigError(`Distiller "${distiller.name}" feeds back to unknown distiller "${distiller.feedback}"`);
      }
    }
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string, env?: NodeJS.ProcessEnv): Promise<RuntimeConfig> {
  return createConfigLoader(configPath, env).load();
}
