import { GenerationRequest } from '../types/index';
import { DEFAULT_PIPELINE } from '../pipelines/registry';
import { UsageError } from './errors';

export interface CliArgs {
  pipeline: string;
  type: string;
  numSamples: number;
  language: string;
  export: boolean;
  outputDir: string;
  model?: string;
  configName?: string;
  persona?: string;
  qaCount: number;
  delayMs: number;
  verbose: boolean;
  listPipelines: boolean;
  help: boolean;
}

export const CLI_DEFAULTS = {
  pipeline: DEFAULT_PIPELINE,
  type: 'bar chart',
  numSamples: 1,
  language: 'English',
  outputDir: 'session_output',
  qaCount: 3,
  delayMs: 0
} as const;

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || (value.startsWith('-') && value.length > 1 && !/^-\d/.test(value))) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

function toInteger(value: string, flag: string, min: number): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new UsageError(`${flag} must be an integer, got "${value}"`);
  }
  const parsed = parseInt(trimmed, 10);
  if (parsed < min) {
    throw new UsageError(`${flag} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    pipeline: CLI_DEFAULTS.pipeline,
    type: CLI_DEFAULTS.type,
    numSamples: CLI_DEFAULTS.numSamples,
    language: CLI_DEFAULTS.language,
    export: true,
    outputDir: CLI_DEFAULTS.outputDir,
    qaCount: CLI_DEFAULTS.qaCount,
    delayMs: CLI_DEFAULTS.delayMs,
    verbose: false,
    listPipelines: false,
    help: false
  };

  for (let i = 0; i < args.length; i++) {
    const [flag, inlineValue]: [string, string | undefined] = args[i].startsWith('--') && args[i].includes('=')
      ? [args[i].slice(0, args[i].indexOf('=')), args[i].slice(args[i].indexOf('=') + 1)]
      : [args[i], undefined];

    const value = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = takeValue(args, i, flag);
      i++;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--pipeline':
      case '-p':
        parsed.pipeline = value();
        break;
      case '--type':
      case '-t':
        parsed.type = value();
        break;
      case '--num_samples':
      case '--num-samples':
      case '-n':
        parsed.numSamples = toInteger(value(), flag, 1);
        break;
      case '--language':
      case '-l':
        parsed.language = value();
        break;
      case '--no-export':
        parsed.export = false;
        break;
      case '--output-dir':
      case '-o':
        parsed.outputDir = value();
        break;
      case '--model':
      case '-m':
        parsed.model = value();
        break;
      case '--config-name':
        parsed.configName = value();
        break;
      case '--persona':
        parsed.persona = value();
        break;
      case '--qa-count':
        parsed.qaCount = toInteger(value(), flag, 1);
        break;
      case '--delay':
        parsed.delayMs = toInteger(value(), flag, 0);
        break;
      case '--verbose':
      case '-v':
        parsed.verbose = true;
        break;
      case '--list-pipelines':
        parsed.listPipelines = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${args[i]}`);
    }
  }

  for (const [name, text] of [['--type', parsed.type], ['--language', parsed.language], ['--pipeline', parsed.pipeline]]) {
    if (!text.trim()) {
      throw new UsageError(`${name} must not be empty`);
    }
  }

  return parsed;
}

export function toGenerationRequest(args: CliArgs): GenerationRequest {
  return {
    pipelineName: args.pipeline,
    chartType: args.type,
    language: args.language,
    sampleCount: args.numSamples,
    exportEnabled: args.export,
    outputDir: args.outputDir,
    persona: args.persona,
    qaCount: args.qaCount,
    delayMs: args.delayMs
  };
}
