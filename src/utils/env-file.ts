import { existsSync, readFileSync, writeFileSync } from 'fs';
import * as dotenv from 'dotenv';

export function readEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) return {};
  return dotenv.parse(readFileSync(filePath, 'utf8'));
}

/**
 * Rewrites a .env file: lines starting with `prefix` are dropped, unrelated
 * lines are kept in order, then `values` are appended. Undefined or empty
 * values are skipped.
 */
export function writeEnvFile(
  filePath: string,
  prefix: string,
  values: Record<string, string | undefined>
): void {
  const lines: string[] = [];

  if (existsSync(filePath)) {
    readFileSync(filePath, 'utf8')
      .split(/\r?\n/)
      .forEach(line => {
        if (!line.startsWith(prefix)) {
          lines.push(line);
        }
      });
  }

  while (lines.length > 0 && !lines[lines.length - 1].trim()) {
    lines.pop();
  }

  for (const [key, value] of Object.entries(values)) {
    if (value) {
      lines.push(`${key}=${value}`);
    }
  }

  writeFileSync(filePath, lines.length > 0 ? lines.join('\n') + '\n' : '');
}
