export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UnknownPipelineError extends Error {
  constructor(readonly pipelineName: string, readonly available: string[]) {
    super(`Unknown pipeline: ${pipelineName}. Available pipelines: ${available.join(', ')}`);
    this.name = 'UnknownPipelineError';
  }
}

export class UnsupportedChartTypeError extends Error {
  constructor(readonly chartType: string, readonly supported: readonly string[]) {
    super(`Unsupported chart type: "${chartType}". Supported types: ${supported.join(', ')}`);
    this.name = 'UnsupportedChartTypeError';
  }
}

export class OpenAIRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | undefined,
    readonly retriable: boolean
  ) {
    super(message);
    this.name = 'OpenAIRequestError';
  }
}

/**
 * Raised when an LLM completion cannot be parsed or fails its schema.
 * `stage` names the prompt that produced it (topic, data, annotations).
 */
export class LlmResponseError extends Error {
  constructor(
    readonly stage: string,
    message: string,
    readonly rawResponse: string
  ) {
    super(`Invalid ${stage} response: ${message}`);
    this.name = 'LlmResponseError';
  }
}
