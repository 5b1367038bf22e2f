import { existsSync } from 'fs';
import { join } from 'path';
import { CliOutput, run } from '../src/bin/cli';
import { parseArgs } from '../src/utils/cli-args';
import { FakeLlm, SALES_SPEC, StubRenderer, fixedPersonas, withTempDir } from './helpers';

const TOPIC = JSON.stringify({ topic: 'Weekday pastry sales at a corner bakery' });
const DATA = JSON.stringify(SALES_SPEC);
const ANNOTATION = JSON.stringify({
  caption: 'Croissant sales peak on Wednesday.',
  qa_pairs: [{ question: 'How many croissants were sold on Monday?', answer: '42' }]
});

const ENV: NodeJS.ProcessEnv = { OPENAI_API_KEY: 'test-key' };

function captureOutput(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => out.push(text),
    stderr: text => err.push(text)
  };
}

function stubGenerator() {
  return { renderer: new StubRenderer(), personas: fixedPersonas() };
}

describe('run', () => {
  it('exits 1 without calling the API when no key is configured', async () => {
    const output = captureOutput();
    const createLlm = jest.fn(() => new FakeLlm([]));

    const code = await run(parseArgs([]), { env: {}, output, createLlm });

    expect(code).toBe(1);
    expect(createLlm).not.toHaveBeenCalled();
    expect(output.out).toEqual([]);
    expect(output.err).toEqual([
      'Error: OPENAI_API_KEY environment variable is required (run "chartgen-init" to create a .env file)'
    ]);
  });

  it('lists the registered pipelines', async () => {
    const output = captureOutput();

    const code = await run(parseArgs(['--list-pipelines']), { env: {}, output });

    expect(code).toBe(0);
    expect(output.out).toEqual(['PlotlyChartPipeline']);
  });

  it('prints one JSON record per sample on stdout when export is off', async () => {
    const output = captureOutput();
    const createLlm = jest.fn(() => new FakeLlm([TOPIC, DATA, ANNOTATION]));

    const code = await run(parseArgs(['--no-export']), { env: ENV, output, createLlm, generator: stubGenerator() });

    expect(code).toBe(0);
    expect(createLlm).toHaveBeenCalledWith(
      { apiKey: 'test-key', baseURL: 'https://api.openai.com/v1', model: 'gpt-4o' },
      expect.objectContaining({ verbose: false })
    );
    expect(output.out).toHaveLength(1);
    expect(JSON.parse(output.out[0])).toMatchObject({
      pipeline: 'PlotlyChartPipeline',
      chart_kind: 'bar',
      topic: 'Weekday pastry sales at a corner bakery',
      data: SALES_SPEC,
      caption: 'Croissant sales peak on Wednesday.',
      image_path: null,
      image_bytes_size: 0,
      model: 'fake-model'
    });
    expect(output.err).toContain('🚫 Export disabled\n');
    expect(output.err).toContain('\n✅ Generated 1 of 1 samples');
  });

  it('exits 1 when a sample fails', async () => {
    const output = captureOutput();

    const code = await run(parseArgs(['--no-export']), {
      env: ENV,
      output,
      createLlm: () => new FakeLlm([]),
      generator: stubGenerator()
    });

    expect(code).toBe(1);
    expect(output.out).toEqual([]);
    expect(output.err).toContain('   ❌ Sample 1 failed: FakeLlm ran out of responses');
    expect(output.err).toContain('⚠️  1 sample(s) failed');
  });

  it('writes the dataset and reports its location when exporting', async () => {
    await withTempDir(async dir => {
      const output = captureOutput();

      const code = await run(parseArgs(['-o', dir]), {
        env: ENV,
        output,
        createLlm: () => new FakeLlm([TOPIC, DATA, ANNOTATION]),
        generator: stubGenerator()
      });

      const jsonlFile = join(dir, 'PlotlyChartPipeline.jsonl');
      expect(code).toBe(0);
      expect(existsSync(join(dir, 'PlotlyChartPipeline_images', 'image_0000.png'))).toBe(true);
      expect(output.out).toContain(`📄 Annotations: ${jsonlFile}`);
      expect(output.err).toEqual([]);
    });
  });
});
