import type { z } from 'zod';
import { GeneratedSample, GenerationRequest, Logger } from '../types/index';
import { annotationSchema, chartSpecSchema, topicSchema } from '../types/schemas';
import type { ChartSpec } from '../types/schemas';
import { ChatCompletionClient } from '../services/openai';
import { ChartRenderer } from '../services/chart-renderer';
import { PersonaSampler } from '../services/persona-sampler';
import { PromptBuilder } from '../services/prompt-builder';
import { ChartKind, isPartToWholeKind, resolveChartKind } from '../utils/chart-types';
import { LlmResponseError } from '../utils/errors';
import { parseJsonResponse } from '../utils/json-response';
import { withRetry } from '../utils/retry';

export interface Pipeline {
  readonly name: string;
  generateSample(index: number): Promise<GeneratedSample>;
}

export interface PipelineContext {
  request: GenerationRequest;
  llm: ChatCompletionClient;
  renderer: ChartRenderer;
  personas: PersonaSampler;
  prompts?: PromptBuilder;
  logger?: Logger;
  verbose?: boolean;
  parseAttempts?: number;
}

/**
 * Checks the rules a spec must meet for its chart kind beyond the schema:
 * one series for pie/donut, numeric x values for scatter.
 */
export function validateSpecForKind(spec: ChartSpec, kind: ChartKind): string | null {
  if (isPartToWholeKind(kind) && spec.series.length !== 1) {
    return `${kind} charts need exactly one series, got ${spec.series.length}`;
  }
  if (isPartToWholeKind(kind)) {
    const negative = spec.series[0].values.some(value => value < 0);
    if (negative) return `${kind} chart values must not be negative`;
  }
  if (kind === 'scatter') {
    const invalid = spec.categories.find(category => !Number.isFinite(Number(category)));
    if (invalid !== undefined) return `scatter categories must be numeric, got "${invalid}"`;
  }
  return null;
}

/**
 * Persona → topic → chart data → rendered image → caption and QA pairs.
 */
export class ChartPipeline implements Pipeline {
  readonly name: string;
  private readonly request: GenerationRequest;
  private readonly chartKind: ChartKind;
  private readonly llm: ChatCompletionClient;
  private readonly renderer: ChartRenderer;
  private readonly personas: PersonaSampler;
  private readonly prompts: PromptBuilder;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  private readonly parseAttempts: number;

  constructor(name: string, context: PipelineContext) {
    this.name = name;
    this.request = context.request;
    this.chartKind = resolveChartKind(context.request.chartType);
    this.llm = context.llm;
    this.renderer = context.renderer;
    this.personas = context.personas;
    this.prompts = context.prompts ?? new PromptBuilder();
    this.logger = context.logger ?? console;
    this.verbose = context.verbose ?? false;
    this.parseAttempts = context.parseAttempts ?? 2;
  }

  async generateSample(index: number): Promise<GeneratedSample> {
    const { chartType, language, qaCount } = this.request;
    const persona = this.request.persona ?? this.personas.sample();
    this.log(`👤 Persona: ${persona}`);

    const { topic } = await this.requestJson(
      this.prompts.buildTopicPrompt({ persona, chartType, language }),
      topicSchema,
      'topic',
      0.9
    );
    this.log(`🧭 Topic: ${topic}`);

    const spec = await this.requestJson(
      this.prompts.buildDataPrompt({ topic, persona, chartType, chartKind: this.chartKind, language }),
      chartSpecSchema,
      'data',
      0.7,
      parsed => validateSpecForKind(parsed, this.chartKind)
    );
    this.log(`📊 Data: "${spec.title}" (${spec.categories.length} categories, ${spec.series.length} series)`);

    const rendered = await this.renderer.render(spec, this.chartKind);

    const annotation = await this.requestJson(
      this.prompts.buildAnnotationPrompt({ spec, chartType, language, qaCount }),
      annotationSchema,
      'annotations',
      0.5
    );
    this.log(`📝 Annotations: ${annotation.qa_pairs.length} QA pairs`);

    return {
      index,
      persona,
      topic,
      chartType,
      chartKind: this.chartKind,
      language,
      spec,
      annotation,
      image: rendered.png,
      width: rendered.width,
      height: rendered.height,
      model: this.llm.model
    };
  }

  private async requestJson<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    stage: string,
    temperature: number,
    check?: (value: z.infer<S>) => string | null
  ): Promise<z.infer<S>> {
    return withRetry(
      async () => {
        const response = await this.llm.complete(prompt, { forceJson: true, temperature });
        const value = parseJsonResponse(response, schema, stage);
        const problem = check?.(value);
        if (problem) {
          throw new LlmResponseError(stage, problem, response);
        }
        return value;
      },
      {
        maxAttempts: this.parseAttempts,
        initialDelayMs: 0,
        shouldRetry: error => error instanceof LlmResponseError,
        onRetry: error => this.logger.warn(`⚠️  ${error.message}. Asking again...`)
      }
    );
  }

  private log(message: string): void {
    if (this.verbose) {
      this.logger.log(message);
    }
  }
}
