import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_PERSONAS_FILE = join(__dirname, '..', '..', 'data', 'personas.json');

const personaListSchema = z.array(z.string().trim().min(1)).min(1);

/**
 * Picks the persona that steers each sample's topic. Personas may be written
 * in any language.
 */
export class PersonaSampler {
  private readonly personas: string[];
  private readonly random: () => number;

  constructor(personas: string[], random: () => number = Math.random) {
    if (personas.length === 0) {
      throw new ConfigError('Persona list is empty');
    }
    this.personas = [...personas];
    this.random = random;
  }

  static fromFile(filePath: string = DEFAULT_PERSONAS_FILE, random?: () => number): PersonaSampler {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to read personas from ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const parsed = personaListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Persona file ${filePath} must contain a non-empty array of strings`);
    }
    return new PersonaSampler(parsed.data, random);
  }

  get size(): number {
    return this.personas.length;
  }

  sample(): string {
    const index = Math.min(Math.floor(this.random() * this.personas.length), this.personas.length - 1);
    return this.personas[index];
  }
}
