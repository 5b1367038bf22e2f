import { GenerationRequest, GenerationResult, Logger, SampleFailure, SampleRecord } from '../types/index';
import { Pipeline } from '../pipelines/chart-pipeline';
import { PipelineRegistry, createDefaultRegistry } from '../pipelines/registry';
import { errorMessage } from '../utils/errors';
import { ChartRenderer } from './chart-renderer';
import { DatasetExporter, buildSampleRecord } from './dataset-exporter';
import { ChatCompletionClient } from './openai';
import { PersonaSampler } from './persona-sampler';

export interface ChartDatasetGeneratorOptions {
  registry?: PipelineRegistry;
  renderer?: ChartRenderer;
  personas?: PersonaSampler;
  logger?: Logger;
  verbose?: boolean;
  onRecord?: (record: SampleRecord) => void;
}

export class ChartDatasetGenerator {
  private readonly registry: PipelineRegistry;
  private readonly renderer: ChartRenderer;
  private readonly personas?: PersonaSampler;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  private readonly onRecord?: (record: SampleRecord) => void;

  constructor(private readonly llm: ChatCompletionClient, options: ChartDatasetGeneratorOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.renderer = options.renderer ?? new ChartRenderer();
    this.personas = options.personas;
    this.logger = options.logger ?? console;
    this.verbose = options.verbose ?? false;
    this.onRecord = options.onRecord;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const records: SampleRecord[] = [];
    const failures: SampleFailure[] = [];

    let pipeline: Pipeline;
    let exporter: DatasetExporter | undefined;

    try {
      pipeline = this.registry.create(request.pipelineName, {
        request,
        llm: this.llm,
        renderer: this.renderer,
        personas: this.personas ?? PersonaSampler.fromFile(),
        logger: this.logger,
        verbose: this.verbose
      });

      if (request.exportEnabled) {
        exporter = new DatasetExporter(request.outputDir, pipeline.name);
        await exporter.prepare();
      }
    } catch (error) {
      return {
        success: false,
        generatedCount: 0,
        failedCount: 0,
        records,
        failures,
        error: errorMessage(error)
      };
    }

    for (let index = 0; index < request.sampleCount; index++) {
      this.logger.log(`🎨 Sample ${index + 1}/${request.sampleCount}...`);

      try {
        const sample = await pipeline.generateSample(index);
        const record = exporter
          ? await exporter.writeSample(sample)
          : buildSampleRecord(sample, pipeline.name, null);

        records.push(record);
        this.onRecord?.(record);
        this.logger.log(
          record.image_path
            ? `   ✅ ${record.data.title} → ${record.image_path}`
            : `   ✅ ${record.data.title}`
        );
      } catch (error) {
        failures.push({ index, error: errorMessage(error) });
        this.logger.error(`   ❌ Sample ${index + 1} failed: ${errorMessage(error)}`);
      }

      if (request.delayMs > 0 && index < request.sampleCount - 1) {
        await new Promise(resolve => setTimeout(resolve, request.delayMs));
      }
    }

    return {
      success: failures.length === 0,
      generatedCount: records.length,
      failedCount: failures.length,
      records,
      failures,
      jsonlFile: exporter?.paths.jsonlFile,
      imagesDir: exporter?.paths.imagesDir
    };
  }
}
