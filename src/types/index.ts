import type { ChartKind } from '../utils/chart-types';
import type { Annotation, ChartSpec, QaPair } from './schemas';

export interface OpenAIConfig {
  apiKey: string;
  baseURL: string;
  model: string;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface GenerationRequest {
  pipelineName: string;
  chartType: string;
  language: string;
  sampleCount: number;
  exportEnabled: boolean;
  outputDir: string;
  persona?: string;
  qaCount: number;
  delayMs: number;
}

export interface GeneratedSample {
  index: number;
  persona: string;
  topic: string;
  chartType: string;
  chartKind: ChartKind;
  language: string;
  spec: ChartSpec;
  annotation: Annotation;
  image: Buffer;
  width: number;
  height: number;
  model: string;
}

// One JSONL line. Field names are snake_case to match the dataset format.
export interface SampleRecord {
  id: string;
  pipeline: string;
  chart_type: string;
  chart_kind: ChartKind;
  language: string;
  persona: string;
  topic: string;
  data: ChartSpec;
  caption: string;
  qa_pairs: QaPair[];
  image_path: string | null;
  image_bytes_size: number;
  width: number;
  height: number;
  model: string;
  created_at: string;
}

export interface SampleFailure {
  index: number;
  error: string;
}

export interface GenerationResult {
  success: boolean;
  generatedCount: number;
  failedCount: number;
  records: SampleRecord[];
  failures: SampleFailure[];
  jsonlFile?: string;
  imagesDir?: string;
  error?: string;
}

export type { Annotation, ChartSpec, QaPair } from './schemas';
export type { ChartKind } from '../utils/chart-types';
