import { appendFile, mkdir, rm, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { join } from 'path';
import { GeneratedSample, SampleRecord } from '../types/index';

export interface ExportPaths {
  jsonlFile: string;
  imagesDir: string;
}

export function exportPaths(outputDir: string, pipelineName: string): ExportPaths {
  const base = join(outputDir, pipelineName);
  return {
    jsonlFile: `${base}.jsonl`,
    imagesDir: `${base}_images`
  };
}

export function imageFileName(index: number): string {
  return `image_${String(index).padStart(4, '0')}.png`;
}

export function buildSampleRecord(
  sample: GeneratedSample,
  pipelineName: string,
  imagePath: string | null,
  createdAt: Date = new Date()
): SampleRecord {
  return {
    id: randomUUID(),
    pipeline: pipelineName,
    chart_type: sample.chartType,
    chart_kind: sample.chartKind,
    language: sample.language,
    persona: sample.persona,
    topic: sample.topic,
    data: sample.spec,
    caption: sample.annotation.caption,
    qa_pairs: sample.annotation.qa_pairs,
    image_path: imagePath,
    image_bytes_size: imagePath ? sample.image.length : 0,
    width: sample.width,
    height: sample.height,
    model: sample.model,
    created_at: createdAt.toISOString()
  };
}

/**
 * Writes each sample as a PNG plus one JSONL line. The image goes first;
 * if the record cannot be appended the image is removed again, so every PNG
 * on disk has a record.
 */
export class DatasetExporter {
  readonly paths: ExportPaths;
  private prepared = false;

  constructor(outputDir: string, private readonly pipelineName: string) {
    this.paths = exportPaths(outputDir, pipelineName);
  }

  /** Starts a fresh run: images and records from an earlier run are removed. */
  async prepare(): Promise<void> {
    await rm(this.paths.imagesDir, { recursive: true, force: true });
    await mkdir(this.paths.imagesDir, { recursive: true });
    await writeFile(this.paths.jsonlFile, '', 'utf8');
    this.prepared = true;
  }

  async writeSample(sample: GeneratedSample): Promise<SampleRecord> {
    if (!this.prepared) {
      await this.prepare();
    }

    const imagePath = join(this.paths.imagesDir, imageFileName(sample.index));
    await writeFile(imagePath, sample.image);

    const record = buildSampleRecord(sample, this.pipelineName, imagePath);
    try {
      await appendFile(this.paths.jsonlFile, JSON.stringify(record) + '\n', 'utf8');
    } catch (error) {
      await rm(imagePath, { force: true });
      throw error;
    }

    return record;
  }
}
