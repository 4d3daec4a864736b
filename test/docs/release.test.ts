import { describe, it, expect } from 'vitest';
import {
  formatMetricValue,
  releaseJson,
  renderReleaseJson,
  renderReleaseMarkdown,
  type ReleaseEvidence,
} from '../../src/docs/release.js';
import { QualityGateEvaluator } from '../../src/gates/quality.js';

const FIXED_CLOCK = () => new Date('2026-03-01T12:00:00.000Z');

function sampleEvidence(overrides: Partial<ReleaseEvidence> = {}): ReleaseEvidence {
  const gates = new QualityGateEvaluator(FIXED_CLOCK).evaluate({
    compatibilityPassRate: 0.96,
    flakeRate: 0.01,
    p95LatencyMillis: 3.25,
    reproTimeP50Minutes: 0.0125,
  });
  return {
    gates,
    durationMillis: 1500,
    seed: 'corpus-a',
    compatibility: { total: 100, match: 96, mismatch: 3, error: 1 },
    flake: { runs: 2, observations: 100, flakyObservations: 1, rate: 0.01 },
    latency: { sampleCount: 40, p95Millis: 3.25 },
    repro: { sampleCount: 3, samplesMinutes: [0.01, 0.0125, 0.02], p50Minutes: 0.0125 },
    reproScenarioId: 'b',
    regressions: [],
    ...overrides,
  };
}

describe('docs/release', () => {
  describe('formatMetricValue', () => {
    it('should format each metric in its own unit', () => {
      expect(formatMetricValue('compatibilityPassRate', 0.96)).toBe('96.00%');
      expect(formatMetricValue('flakeRate', 0.005)).toBe('0.50%');
      expect(formatMetricValue('p95LatencyMillis', 3.25)).toBe('3.25ms');
      expect(formatMetricValue('reproTimeP50Minutes', 0.0125)).toBe('0.0125min');
      expect(formatMetricValue('other', 1.5)).toBe('1.5000');
    });
  });

  describe('releaseJson', () => {
    it('should carry the overall verdict and build info', () => {
      const json = releaseJson(sampleEvidence());

      expect(json.generatedAt).toBe('2026-03-01T12:00:00.000Z');
      expect(json.overallStatus).toBe('FAIL');
      expect(json.summary).toEqual({ pass: 3, fail: 1 });
      expect(json.buildInfo).toEqual({ durationMillis: 1500, seed: 'corpus-a' });
      expect(json.metrics).toEqual({
        compatibilityPassRate: 0.96,
        flakeRate: 0.01,
        p95LatencyMillis: 3.25,
        reproTimeP50Minutes: 0.0125,
      });
    });

    it('should list every gate check', () => {
      const json = releaseJson(sampleEvidence());

      expect(json.gates).toEqual([
        {
          gateId: 'compatibility-pass-rate',
          metricKey: 'compatibilityPassRate',
          measuredValue: 0.96,
          operator: '>=',
          thresholdValue: 0.95,
          status: 'PASS',
        },
        {
          gateId: 'flake-rate',
          metricKey: 'flakeRate',
          measuredValue: 0.01,
          operator: '<=',
          thresholdValue: 0.005,
          status: 'FAIL',
        },
        {
          gateId: 'p95-latency',
          metricKey: 'p95LatencyMillis',
          measuredValue: 3.25,
          operator: '<=',
          thresholdValue: 5,
          status: 'PASS',
        },
        {
          gateId: 'repro-time-p50',
          metricKey: 'reproTimeP50Minutes',
          measuredValue: 0.0125,
          operator: '<=',
          thresholdValue: 5,
          status: 'PASS',
        },
      ]);
    });

    it('should write repro evidence with its scenario', () => {
      expect(releaseJson(sampleEvidence()).repro).toEqual({
        scenarioId: 'b',
        sampleCount: 3,
        p50Minutes: 0.0125,
        samplesMinutes: [0.01, 0.0125, 0.02],
      });
    });

    it('should write null repro evidence when nothing was replayed', () => {
      const json = releaseJson(sampleEvidence({ repro: undefined, reproScenarioId: undefined }));

      expect(json.repro).toBeNull();
      expect(json.reproDiagnostic).toBeNull();
    });

    it('should carry the diagnostic when repro time went unmeasured', () => {
      const json = releaseJson(sampleEvidence({ repro: undefined, reproDiagnostic: '1 non-matching scenario did not fail' }));

      expect(json.reproDiagnostic).toBe('1 non-matching scenario did not fail');
    });
  });

  describe('renderReleaseJson', () => {
    it('should pass validation against the bundled schema', () => {
      expect(() => renderReleaseJson(sampleEvidence(), { validate: true })).not.toThrow();
      expect(() => renderReleaseJson(sampleEvidence({ repro: undefined }), { validate: true })).not.toThrow();
      expect(() =>
        renderReleaseJson(sampleEvidence({ repro: undefined, reproDiagnostic: 'not measured' }), { validate: true })
      ).not.toThrow();
    });
  });

  describe('renderReleaseMarkdown', () => {
    it('should render each metric against its threshold', () => {
      const markdown = renderReleaseMarkdown(sampleEvidence());

      expect(markdown).toContain(
        [
          '## Metrics',
          '- compatibilityPassRate: 96.00% (>= 95.00%) PASS',
          '- flakeRate: 1.00% (<= 0.50%) FAIL',
          '- p95LatencyMillis: 3.25ms (<= 5.00ms) PASS',
          '- reproTimeP50Minutes: 0.0125min (<= 5.0000min) PASS',
        ].join('\n')
      );
    });

    it('should render the evidence sections', () => {
      const markdown = renderReleaseMarkdown(sampleEvidence());

      expect(markdown).toContain('- overallStatus: FAIL\n- passed: 3\n- failed: 1\n');
      expect(markdown).toContain(
        '## Compatibility Summary\n- total: 100\n- match: 96\n- mismatch: 3\n- error: 1\n'
      );
      expect(markdown).toContain(
        '## Flake Evidence\n- runs: 2\n- observations: 100\n- flakyObservations: 1\n- rate: 1.00%\n'
      );
      expect(markdown).toContain('## Latency Evidence\n- sampleCount: 40\n- p95: 3.25ms\n');
      expect(markdown).toContain(
        '## Repro Evidence\n- scenario: b\n- sampleCount: 3\n- p50: 0.0125min\n- samples: 0.0100min, 0.0125min, 0.0200min\n'
      );
      expect(markdown.endsWith('## Top Regressions\n- none\n')).toBe(true);
    });

    it('should say when there was no failure to replay', () => {
      const markdown = renderReleaseMarkdown(sampleEvidence({ repro: undefined }));

      expect(markdown).toContain('## Repro Evidence\n- no failing scenario to replay\n');
    });

    it('should show the diagnostic when failures did not reproduce', () => {
      const markdown = renderReleaseMarkdown(
        sampleEvidence({ repro: undefined, reproDiagnostic: '1 non-matching scenario did not fail' })
      );

      expect(markdown).toContain('## Repro Evidence\n- 1 non-matching scenario did not fail\n');
    });
  });
});
