// Main services for programmatic usage
export { ChartDatasetGenerator } from './services/chart-generator';
export { OpenAIService } from './services/openai';
export { LlmConfigService } from './services/llm-config';
export { ChartRenderer } from './services/chart-renderer';
export { DatasetExporter, buildSampleRecord, exportPaths } from './services/dataset-exporter';
export { PersonaSampler } from './services/persona-sampler';
export { PromptBuilder } from './services/prompt-builder';

// Pipelines
export { ChartPipeline } from './pipelines/chart-pipeline';
export { PipelineRegistry, createDefaultRegistry, DEFAULT_PIPELINE } from './pipelines/registry';

// Utilities
export { CHART_KINDS, resolveChartKind } from './utils/chart-types';
export { parseJsonResponse } from './utils/json-response';
export { withRetry } from './utils/retry';
export {
  ConfigError,
  LlmResponseError,
  OpenAIRequestError,
  UnknownPipelineError,
  UnsupportedChartTypeError,
  UsageError
} from './utils/errors';

// Types
export type {
  OpenAIConfig,
  GenerationRequest,
  GenerationResult,
  GeneratedSample,
  SampleRecord,
  ChartSpec,
  Annotation,
  ChartKind,
  Logger
} from './types/index';

export type { ChatCompletionClient, CompletionOptions } from './services/openai';
export type { Pipeline, PipelineContext } from './pipelines/chart-pipeline';
export type { PipelineFactory } from './pipelines/registry';

// Default export for convenience
export { ChartDatasetGenerator as default } from './services/chart-generator';
