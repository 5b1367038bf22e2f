import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ChartRenderer, RenderedChart } from '../src/services/chart-renderer';
import { ChatCompletionClient, CompletionOptions } from '../src/services/openai';
import { PersonaSampler } from '../src/services/persona-sampler';
import { GeneratedSample, GenerationRequest, Logger } from '../src/types/index';
import { ChartSpec } from '../src/types/schemas';
import { ChartKind } from '../src/utils/chart-types';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01, 0x02]);

export const SALES_SPEC: ChartSpec = {
  title: 'Pastry sales by weekday',
  x_axis_label: 'Day',
  y_axis_label: 'Units sold',
  categories: ['Mon', 'Tue', 'Wed'],
  series: [{ name: 'Croissants', values: [42, 38, 51] }]
};

export function silentLogger(): jest.Mocked<Logger> {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export function makeRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    pipelineName: 'PlotlyChartPipeline',
    chartType: 'bar chart',
    language: 'English',
    sampleCount: 1,
    exportEnabled: true,
    outputDir: 'session_output',
    qaCount: 2,
    delayMs: 0,
    ...overrides
  };
}

export function makeSample(index: number, overrides: Partial<GeneratedSample> = {}): GeneratedSample {
  return {
    index,
    persona: 'A small bakery owner',
    topic: 'Weekday pastry sales at a corner bakery',
    chartType: 'bar chart',
    chartKind: 'bar',
    language: 'English',
    spec: SALES_SPEC,
    annotation: {
      caption: 'Croissant sales peak on Wednesday.',
      qa_pairs: [{ question: 'How many croissants were sold on Tuesday?', answer: '38' }]
    },
    image: PNG_BYTES,
    width: 800,
    height: 600,
    model: 'gpt-4o',
    ...overrides
  };
}

/**
 * Answers prompts from a queue, in call order, and records what it was asked.
 */
export class FakeLlm implements ChatCompletionClient {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];

  constructor(private readonly responses: string[]) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('FakeLlm ran out of responses');
    }
    return next;
  }
}

export class StubRenderer extends ChartRenderer {
  readonly calls: Array<{ spec: ChartSpec; kind: ChartKind }> = [];

  async render(spec: ChartSpec, kind: ChartKind): Promise<RenderedChart> {
    this.calls.push({ spec, kind });
    return { svg: '<svg></svg>', png: PNG_BYTES, width: this.width, height: this.height };
  }
}

export function fixedPersonas(persona = 'A marathon runner'): PersonaSampler {
  return new PersonaSampler([persona], () => 0);
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'chartgen-test-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
