import { writeFile } from 'fs/promises';
import { join } from 'path';
import { LlmConfigService, isValidApiKey, maskApiKey } from '../src/services/llm-config';
import { ConfigError } from '../src/utils/errors';
import { withTempDir } from './helpers';

const env: NodeJS.ProcessEnv = { OPENAI_API_KEY: 'test-key' };

const named = {
  fast: { model: 'gpt-4o-mini' },
  local: { model: 'llama-3-8b', base_url: 'http://localhost:8000/v1/', api_key: 'local-key' }
};

describe('LlmConfigService', () => {
  it('builds the default config from the environment', () => {
    expect(LlmConfigService.getDefaultConfig({})).toEqual({
      apiKey: '',
      baseURL: 'https://api.openai.com/v1',
      model: 'gpt-4o'
    });
    expect(LlmConfigService.getDefaultConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:8080/v1/',
      OPENAI_MODEL: 'gpt-4.1'
    })).toEqual({ apiKey: 'test-key', baseURL: 'http://localhost:8080/v1', model: 'gpt-4.1' });
  });

  it('looks up named configs and falls back to default fields', () => {
    const service = new LlmConfigService(named, env);

    expect(service.getByConfigName('fast')).toEqual({
      apiKey: 'test-key',
      baseURL: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini'
    });
    expect(service.getByConfigName('local')).toEqual({
      apiKey: 'local-key',
      baseURL: 'http://localhost:8000/v1',
      model: 'llama-3-8b'
    });
    expect(service.getByConfigName()).toEqual({ apiKey: 'test-key', baseURL: 'https://api.openai.com/v1', model: 'gpt-4o' });
  });

  it('fails for an unknown config name', () => {
    const service = new LlmConfigService(named, env);
    expect(() => service.getByConfigName('missing')).toThrow(ConfigError);
    expect(() => service.getByConfigName('missing')).toThrow("Config name 'missing' not found");
  });

  it('finds configs by model name or overrides the default model', () => {
    const service = new LlmConfigService(named, env);

    expect(service.getByModelName('llama-3-8b').apiKey).toBe('local-key');
    expect(service.getByModelName('o3')).toEqual({ apiKey: 'test-key', baseURL: 'https://api.openai.com/v1', model: 'o3' });
  });

  it('returns copies', () => {
    const service = new LlmConfigService(named, env);
    const first = service.getByConfigName();
    first.model = 'changed';

    expect(service.getByConfigName().model).toBe('gpt-4o');
  });

  it('applies a model override on top of a named config', () => {
    const service = new LlmConfigService(named, env);
    expect(service.resolve({ configName: 'local', modelName: 'llama-3-70b' })).toEqual({
      apiKey: 'local-key',
      baseURL: 'http://localhost:8000/v1',
      model: 'llama-3-70b'
    });
    expect(service.resolve({}).model).toBe('gpt-4o');
  });

  it('loads named configs from a JSON file', async () => {
    await withTempDir(async dir => {
      const path = join(dir, 'llm-config.json');
      await writeFile(path, JSON.stringify(named));

      const service = LlmConfigService.fromFile(path, env);
      expect(service.listConfigNames()).toEqual(['fast', 'local']);
      expect(service.getByConfigName('fast').model).toBe('gpt-4o-mini');
    });
  });

  it('rejects an invalid or missing config file', async () => {
    await withTempDir(async dir => {
      const path = join(dir, 'llm-config.json');
      await writeFile(path, JSON.stringify({ broken: { base_url: 'not a url' } }));

      expect(() => LlmConfigService.fromFile(path, env)).toThrow(ConfigError);
      expect(() => LlmConfigService.fromFile(join(dir, 'nope.json'), env)).toThrow(
        `LLM config file not found: ${join(dir, 'nope.json')}`
      );
    });
  });
});

describe('API key helpers', () => {
  it('accepts keys that look like OpenAI keys', () => {
    expect(isValidApiKey('sk-test-0000000000000000')).toBe(true);
    expect(isValidApiKey('sk-short')).toBe(false);
    expect(isValidApiKey('test-secret-000000000000')).toBe(false);
  });

  it('masks all but the edges of a key', () => {
    expect(maskApiKey('sk-test-0000000000000000')).toBe('sk-t...0000');
    expect(maskApiKey('short')).toBe('****');
  });
});
