import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../../src/config/loader.js';
import { summarizeReport } from '../../src/diff/types.js';
import { runCompare } from '../../src/workflow/compare.js';
import { loadTemplates } from '../../src/workflow/scenarios.js';

const EXAMPLE_CONFIG = fileURLToPath(new URL('../../examples/quickstart/paritykit.yaml', import.meta.url));

describe('examples/quickstart', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'paritykit-example-'));
  });

  afterEach(() => {
    try {
      rmSync(outputDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should validate and resolve paths against the example directory', () => {
    const { config } = loadConfig(EXAMPLE_CONFIG);
    const exampleDir = fileURLToPath(new URL('../../examples/quickstart/', import.meta.url));

    expect(config.scenarios.paths).toEqual([join(exampleDir, 'catalogue.yaml')]);
    expect(config.backends.left).toEqual({
      type: 'recorded',
      name: 'candidate',
      path: join(exampleDir, 'recordings/candidate.json'),
    });
    expect(config.corpus).toEqual({ seed: 'quickstart', size: 12, expand: false });
  });

  it('should load four templates and skip the change stream entry', () => {
    const { config } = loadConfig(EXAMPLE_CONFIG);
    const { scenarios, skipped } = loadTemplates(config);

    expect(scenarios.map((scenario) => scenario.id)).toEqual([
      'insert-basic',
      'find-by-name',
      'duplicate-key',
      'update-inc',
    ]);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].id).toBe('change-streams');
  });

  it('should report the modified count as the only regression', async () => {
    const { config } = loadConfig(EXAMPLE_CONFIG);
    const result = await runCompare({ config: { ...config, output: { ...config.output, dir: outputDir } } });

    expect(summarizeReport(result.report)).toEqual({ total: 4, match: 3, mismatch: 1, error: 0 });
    expect(result.gate.status).toBe('FAIL');
    expect(result.regressions.map((sample) => sample.scenarioId)).toEqual(['update-inc']);
  });
});
