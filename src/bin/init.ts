#!/usr/bin/env node

import { join } from 'path';
import * as readline from 'readline/promises';
import { DEFAULT_BASE_URL, DEFAULT_MODEL, isValidApiKey, maskApiKey } from '../services/llm-config';
import { readEnvFile, writeEnvFile } from '../utils/env-file';
import { errorMessage } from '../utils/errors';

const ENV_FILE_PATH = join(process.cwd(), '.env');

const SUGGESTED_MODELS = ['gpt-4o', 'gpt-4o-mini', 'gpt-4.1', 'gpt-4.1-mini'];

type OpenAISettings = {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string;
  OPENAI_MODEL?: string;
};

export interface QuestionSource {
  question(query: string): Promise<string>;
  close(): void;
}

export interface InitWizardOptions {
  envPath?: string;
  rl?: QuestionSource;
}

export class InitWizard {
  private readonly envPath: string;
  private readonly rl: QuestionSource;
  private existing: Record<string, string | undefined> = {};

  constructor(options: InitWizardOptions = {}) {
    this.envPath = options.envPath ?? ENV_FILE_PATH;
    this.rl = options.rl ?? readline.createInterface({
      input: process.stdin,
      output: process.stdout
    });
  }

  async run(): Promise<void> {
    try {
      console.log('📊 AI Chart Dataset Generator Configuration\n');
      console.log('This wizard writes your OpenAI connection settings to .env\n');

      this.existing = readEnvFile(this.envPath);

      const settings: OpenAISettings = {
        OPENAI_API_KEY: await this.getApiKey(),
        OPENAI_BASE_URL: await this.getBaseUrl(),
        OPENAI_MODEL: await this.selectModel()
      };

      writeEnvFile(this.envPath, 'OPENAI_', settings);

      console.log('\n✅ Configuration completed successfully!');
      console.log('\n🚀 You can now generate charts:');
      console.log('   ai-generate-charts --type "bar chart" --num_samples 10\n');
    } catch (error) {
      console.error('\n❌ Configuration failed:', errorMessage(error));
      process.exitCode = 1;
    } finally {
      this.rl.close();
    }
  }

  private async getApiKey(): Promise<string> {
    console.log('Step 1: OpenAI API Key\n');
    console.log('📌 Get your API key from: \x1b[36mhttps://platform.openai.com/api-keys\x1b[0m\n');

    const existingKey = this.existing.OPENAI_API_KEY;
    if (existingKey) {
      const keep = await this.askQuestion(`Found existing API key (${maskApiKey(existingKey)}). Keep it? (y/n) `);
      if (keep.toLowerCase() === 'y' || keep.toLowerCase() === 'yes') {
        return existingKey;
      }
    }

    let apiKey = '';
    while (!isValidApiKey(apiKey)) {
      apiKey = await this.askQuestion('Enter your OpenAI API key: ');
      if (!isValidApiKey(apiKey)) {
        console.log('❌ Invalid API key format. Please try again.\n');
      }
    }

    return apiKey;
  }

  private async getBaseUrl(): Promise<string | undefined> {
    console.log('\nStep 2: API endpoint');
    const current = this.existing.OPENAI_BASE_URL || DEFAULT_BASE_URL;
    const answer = await this.askQuestion(`Base URL (default: ${current}): `);
    const baseUrl = answer || current;

    // The default endpoint needs no entry in .env.
    return baseUrl === DEFAULT_BASE_URL ? undefined : baseUrl;
  }

  private async selectModel(): Promise<string | undefined> {
    console.log('\nStep 3: Model Selection\n');
    SUGGESTED_MODELS.forEach((model, index) => {
      console.log(`   ${index + 1}. ${model}${model === DEFAULT_MODEL ? ' (default)' : ''}`);
    });
    console.log(`   ${SUGGESTED_MODELS.length + 1}. Custom (enter your own model ID)`);

    const choice = await this.askQuestion(`\nChoose model (1-${SUGGESTED_MODELS.length + 1}, Enter for default): `);
    if (!choice) {
      return this.existing.OPENAI_MODEL;
    }

    const choiceNum = parseInt(choice, 10);
    if (choiceNum === SUGGESTED_MODELS.length + 1) {
      const custom = await this.askQuestion('Enter model ID: ');
      return custom || undefined;
    }
    if (isNaN(choiceNum) || choiceNum < 1 || choiceNum > SUGGESTED_MODELS.length) {
      console.log('Invalid choice, keeping the current model.');
      return this.existing.OPENAI_MODEL;
    }
    return SUGGESTED_MODELS[choiceNum - 1];
  }

  private async askQuestion(prompt: string): Promise<string> {
    const answer = await this.rl.question(prompt);
    return answer.trim();
  }
}

if (require.main === module) {
  new InitWizard().run().catch((error: unknown) => {
    console.error('Unexpected error:', errorMessage(error));
    process.exit(1);
  });
}
