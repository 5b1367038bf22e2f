#!/usr/bin/env node

import { join } from 'path';
import * as dotenv from 'dotenv';
import { ChartDatasetGenerator, ChartDatasetGeneratorOptions } from '../services/chart-generator';
import { LlmConfigService } from '../services/llm-config';
import { ChatCompletionClient, OpenAIService, OpenAIServiceOptions } from '../services/openai';
import { createDefaultRegistry } from '../pipelines/registry';
import { CHART_KINDS } from '../utils/chart-types';
import { CliArgs, CLI_DEFAULTS, parseArgs, toGenerationRequest } from '../utils/cli-args';
import { UsageError, errorMessage } from '../utils/errors';
import { Logger, OpenAIConfig } from '../types/index';

export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliRunOptions {
  env?: NodeJS.ProcessEnv;
  output?: CliOutput;
  createLlm?: (config: OpenAIConfig, options: OpenAIServiceOptions) => ChatCompletionClient;
  generator?: Pick<ChartDatasetGeneratorOptions, 'registry' | 'renderer' | 'personas'>;
}

const consoleOutput: CliOutput = {
  stdout: text => console.log(text),
  stderr: text => console.error(text)
};

function helpText(): string {
  return `
AI Chart Dataset Generator

Usage:
  ai-generate-charts [options]

Options:
  -p, --pipeline <name>     Generation pipeline (default: ${CLI_DEFAULTS.pipeline})
  -t, --type <chart type>   Chart type, e.g. "bar chart", "line chart", "pie chart" (default: "${CLI_DEFAULTS.type}")
  -n, --num_samples <n>     Number of samples to generate (default: ${CLI_DEFAULTS.numSamples})
  -l, --language <name>     Language of all generated text (default: ${CLI_DEFAULTS.language})
  --no-export               Do not write PNG/JSONL files; print records to stdout
  -o, --output-dir <dir>    Output directory (default: ${CLI_DEFAULTS.outputDir})
  -m, --model <model>       OpenAI model to use (default: OPENAI_MODEL or gpt-4o)
  --config-name <name>      Named config from llm-config.json
  --persona <text>          Use this persona instead of sampling one
  --qa-count <n>            Question/answer pairs per sample (default: ${CLI_DEFAULTS.qaCount})
  --delay <ms>              Pause between samples (default: ${CLI_DEFAULTS.delayMs})
  -v, --verbose             Log every pipeline stage
  --list-pipelines          List available pipelines
  -h, --help                Show this help message

Supported chart types:
  ${CHART_KINDS.join(', ')}

Examples:
  ai-generate-charts --type "line chart" --num_samples 20
  ai-generate-charts -t "pie chart" -n 5 --language Chinese
  ai-generate-charts --type "scatter plot" --no-export

Environment Variables:
  OPENAI_API_KEY            Your OpenAI API key (required)
  OPENAI_BASE_URL           API base URL (default: https://api.openai.com/v1)
  OPENAI_MODEL              Default model (default: gpt-4o)
  CHARTGEN_LLM_CONFIG       Path to a named-config JSON file (default: ./llm-config.json)
`;
}

export async function run(args: CliArgs, options: CliRunOptions = {}): Promise<number> {
  const output = options.output ?? consoleOutput;
  const env = options.env ?? process.env;

  if (args.help) {
    output.stdout(helpText());
    return 0;
  }

  if (args.listPipelines) {
    (options.generator?.registry ?? createDefaultRegistry()).list().forEach(name => output.stdout(name));
    return 0;
  }

  const config = LlmConfigService.fromFile(undefined, env).resolve({
    configName: args.configName,
    modelName: args.model
  });

  if (!config.apiKey) {
    output.stderr('Error: OPENAI_API_KEY environment variable is required (run "chartgen-init" to create a .env file)');
    return 1;
  }

  const request = toGenerationRequest(args);
  // Records go to stdout when export is off, so progress moves to stderr.
  const logger: Logger = {
    log: request.exportEnabled ? output.stdout : output.stderr,
    warn: output.stderr,
    error: output.stderr
  };

  logger.log(`Generating ${request.sampleCount} ${request.chartType} sample(s) with ${request.pipelineName}...`);
  logger.log(`🤖 Model: ${config.model}`);
  logger.log(`🌐 Language: ${request.language}`);
  logger.log(request.exportEnabled ? `📁 Output: ${request.outputDir}\n` : '🚫 Export disabled\n');

  const createLlm = options.createLlm ?? ((llmConfig: OpenAIConfig, llmOptions: OpenAIServiceOptions) => new OpenAIService(llmConfig, llmOptions));
  const llm = createLlm(config, { verbose: args.verbose, logger });
  const generator = new ChartDatasetGenerator(llm, {
    ...options.generator,
    verbose: args.verbose,
    logger,
    onRecord: request.exportEnabled ? undefined : record => output.stdout(JSON.stringify(record))
  });

  const result = await generator.generate(request);

  if (result.error) {
    output.stderr(`\n❌ Generation failed: ${result.error}`);
    return 1;
  }

  logger.log(`\n✅ Generated ${result.generatedCount} of ${request.sampleCount} samples`);
  if (result.jsonlFile) {
    logger.log(`📄 Annotations: ${result.jsonlFile}`);
    logger.log(`🖼️  Images: ${result.imagesDir}`);
  }
  if (result.failedCount > 0) {
    output.stderr(`⚠️  ${result.failedCount} sample(s) failed`);
  }

  return result.success ? 0 : 1;
}

async function main(): Promise<void> {
  dotenv.config({ path: join(process.cwd(), '.env') });

  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.log(helpText());
      process.exit(1);
    }
    throw error;
  }

  process.exitCode = await run(args);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Unexpected error:', errorMessage(error));
    process.exit(1);
  });
}
