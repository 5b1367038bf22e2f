import { UnknownPipelineError } from '../utils/errors';
import { ChartPipeline, Pipeline, PipelineContext } from './chart-pipeline';

export type PipelineFactory = (context: PipelineContext) => Pipeline;

// Kept under this name so existing dataset scripts keep working.
export const DEFAULT_PIPELINE = 'PlotlyChartPipeline';

export class PipelineRegistry {
  private readonly factories = new Map<string, PipelineFactory>();

  register(name: string, factory: PipelineFactory): this {
    if (this.factories.has(name)) {
      throw new Error(`Pipeline already registered: ${name}`);
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }

  create(name: string, context: PipelineContext): Pipeline {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownPipelineError(name, this.list());
    }
    return factory(context);
  }
}

export function createDefaultRegistry(): PipelineRegistry {
  return new PipelineRegistry().register(DEFAULT_PIPELINE, context => new ChartPipeline(DEFAULT_PIPELINE, context));
}
