import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { OpenAIConfig } from '../types/index';
import { ConfigError, errorMessage } from '../utils/errors';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4o';
export const LLM_CONFIG_FILE_ENV = 'CHARTGEN_LLM_CONFIG';

const namedConfigSchema = z.object({
  model: z.string().min(1),
  base_url: z.string().url().optional(),
  api_key: z.string().optional()
});

const configFileSchema = z.record(namedConfigSchema);

type NamedConfig = z.infer<typeof namedConfigSchema>;

export function isValidApiKey(key: string): boolean {
  return key.startsWith('sk-') && key.length > 20;
}

export function maskApiKey(key: string): string {
  if (key.length <= 8) return '****';
  return key.substring(0, 4) + '...' + key.substring(key.length - 4);
}

export interface ResolveConfigOptions {
  configName?: string;
  modelName?: string;
}

/**
 * Resolves the OpenAI connection settings. The default config comes from
 * OPENAI_* environment variables; named configs come from an optional JSON
 * file shaped as { "<name>": { "model", "base_url"?, "api_key"? } }.
 * Every lookup returns a fresh object.
 */
export class LlmConfigService {
  private readonly defaultConfig: OpenAIConfig;
  private readonly namedConfigs: Record<string, NamedConfig>;

  constructor(namedConfigs: Record<string, NamedConfig> = {}, env: NodeJS.ProcessEnv = process.env) {
    this.defaultConfig = LlmConfigService.getDefaultConfig(env);
    this.namedConfigs = namedConfigs;
  }

  static getDefaultConfig(env: NodeJS.ProcessEnv = process.env): OpenAIConfig {
    return {
      apiKey: env.OPENAI_API_KEY || '',
      baseURL: (env.OPENAI_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
      model: env.OPENAI_MODEL || DEFAULT_MODEL
    };
  }

  static fromFile(filePath?: string, env: NodeJS.ProcessEnv = process.env): LlmConfigService {
    const path = filePath || env[LLM_CONFIG_FILE_ENV] || join(process.cwd(), 'llm-config.json');

    if (!existsSync(path)) {
      if (filePath || env[LLM_CONFIG_FILE_ENV]) {
        throw new ConfigError(`LLM config file not found: ${path}`);
      }
      return new LlmConfigService({}, env);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to read LLM config file ${path}: ${errorMessage(error)}`);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigError(`Invalid LLM config file ${path}: ${details}`);
    }

    return new LlmConfigService(parsed.data, env);
  }

  listConfigNames(): string[] {
    return Object.keys(this.namedConfigs);
  }

  getByConfigName(configName?: string): OpenAIConfig {
    if (configName === undefined) {
      return { ...this.defaultConfig };
    }

    const named = this.namedConfigs[configName];
    if (!named) {
      throw new ConfigError(`Config name '${configName}' not found`);
    }
    return this.toConfig(named);
  }

  /**
   * First named config using `modelName`; when none does, the default
   * config with its model replaced.
   */
  getByModelName(modelName?: string): OpenAIConfig {
    if (modelName === undefined) {
      return { ...this.defaultConfig };
    }

    const named = Object.values(this.namedConfigs).find(config => config.model === modelName);
    return named ? this.toConfig(named) : { ...this.defaultConfig, model: modelName };
  }

  resolve(options: ResolveConfigOptions = {}): OpenAIConfig {
    if (options.configName !== undefined) {
      const config = this.getByConfigName(options.configName);
      return options.modelName ? { ...config, model: options.modelName } : config;
    }
    return this.getByModelName(options.modelName);
  }

  private toConfig(named: NamedConfig): OpenAIConfig {
    return {
      apiKey: named.api_key || this.defaultConfig.apiKey,
      baseURL: (named.base_url || this.defaultConfig.baseURL).replace(/\/+$/, ''),
      model: named.model
    };
  }
}
