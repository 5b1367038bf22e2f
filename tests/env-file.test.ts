import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { readEnvFile, writeEnvFile } from '../src/utils/env-file';
import { withTempDir } from './helpers';

describe('readEnvFile', () => {
  it('drops quotes and trailing comments from values', async () => {
    await withTempDir(async dir => {
      const path = join(dir, '.env');
      await writeFile(path, 'OPENAI_MODEL=gpt-4o-mini # cheaper\nOPENAI_API_KEY="sk-abc" # key\n# note\nexport PORT=3000\n');

      expect(readEnvFile(path)).toEqual({ OPENAI_MODEL: 'gpt-4o-mini', OPENAI_API_KEY: 'sk-abc', PORT: '3000' });
    });
  });

  it('returns nothing for a missing file', async () => {
    await withTempDir(async dir => {
      expect(readEnvFile(join(dir, '.env'))).toEqual({});
    });
  });
});

describe('writeEnvFile', () => {
  it('replaces prefixed lines and keeps the rest', async () => {
    await withTempDir(async dir => {
      const path = join(dir, '.env');
      await writeFile(path, 'FOO=1\nOPENAI_API_KEY=old\nOPENAI_MODEL=gpt-4o\n');

      writeEnvFile(path, 'OPENAI_', { OPENAI_API_KEY: 'sk-new', OPENAI_MODEL: undefined });

      expect(await readFile(path, 'utf8')).toBe('FOO=1\nOPENAI_API_KEY=sk-new\n');
    });
  });

  it('keeps blank lines between unrelated sections', async () => {
    await withTempDir(async dir => {
      const path = join(dir, '.env');
      await writeFile(path, 'FOO=1\n\n# section two\nBAR=2\nOPENAI_API_KEY=old\n');

      writeEnvFile(path, 'OPENAI_', { OPENAI_API_KEY: 'sk-new' });

      expect(await readFile(path, 'utf8')).toBe('FOO=1\n\n# section two\nBAR=2\nOPENAI_API_KEY=sk-new\n');
    });
  });

  it('creates the file when it does not exist', async () => {
    await withTempDir(async dir => {
      const path = join(dir, '.env');
      writeEnvFile(path, 'OPENAI_', { OPENAI_API_KEY: 'sk-a', OPENAI_BASE_URL: 'http://localhost:8000/v1' });

      expect(await readFile(path, 'utf8')).toBe('OPENAI_API_KEY=sk-a\nOPENAI_BASE_URL=http://localhost:8000/v1\n');
    });
  });
});
