import * as fs from 'fs';
import * as path from 'path';

import { makeDocuments, makeTempDir, readJson, removeDir } from '../test/testHelpers';

import { resolveConfig } from './config';
import { InvalidConfigurationError } from './errors';
import { loadLog } from './log-codec';
import { applyRunOverrides, parseRunSpec, runSweep } from './sweep';

describe('sweep', () => {
  describe('parseRunSpec', () => {
    it('splits the label from its overrides', () => {
      expect(parseRunSpec('eps05:epsilon=0.05, seed=3,')).toEqual({
        label: 'eps05',
        overrides: { epsilon: '0.05', seed: '3' },
      });
      expect(parseRunSpec('defaults:')).toEqual({ label: 'defaults', overrides: {} });
    });

    it('reports malformed specs', () => {
      expect(() => parseRunSpec('epsilon=0.1')).toThrow(
        "Run spec 'epsilon=0.1' is missing label prefix (label:key=value,...).",
      );
      expect(() => parseRunSpec(' :epsilon=0.1')).toThrow('Run label cannot be empty.');
      expect(() => parseRunSpec('x:epsilon')).toThrow(
        "Invalid token 'epsilon' in run spec 'x:epsilon'. Expected key=value.",
      );
      expect(() => parseRunSpec('x:=1')).toThrow("Missing key in run token '=1'.");
    });

    it.each(['../evil', 'logs/run', 'a\\b', '.', '..'])(
      'rejects label %p as a file name',
      (label) => {
        expect(() => parseRunSpec(`${label}:epsilon=0`)).toThrow(
          `Run label '${label}' cannot be used as a file name.`,
        );
      },
    );
  });

  describe('applyRunOverrides', () => {
    const base = resolveConfig({ steps: 50 });

    it('casts overrides onto the base configuration', () => {
      const config = applyRunOverrides(base, {
        algo: 'ucb',
        ucb_confidence: '0.7',
        seed: '2',
        slate_size: '2',
      });
      expect(config.algo).toBe('ucb');
      expect(config.ucbConfidence).toBe(0.7);
      expect(config.seed).toBe(2);
      expect(config.slateSize).toBe(2);
      expect(config.steps).toBe(50);
    });

    it('rejects unknown keys and unparsable values', () => {
      expect(() => applyRunOverrides(base, { gamma: '1' })).toThrow("Unsupported override 'gamma'.");
      expect(() => applyRunOverrides(base, { toString: '1' })).toThrow(InvalidConfigurationError);
      expect(() => applyRunOverrides(base, { seed: '1.5' })).toThrow(
        "Failed to parse override 'seed=1.5'.",
      );
      expect(() => applyRunOverrides(base, { epsilon: 'abc' })).toThrow(
        "Failed to parse override 'epsilon=abc'.",
      );
      expect(() => applyRunOverrides(base, { algo: 'bogus' })).toThrow(InvalidConfigurationError);
    });
  });

  describe('runSweep', () => {
    let tempDir: string;
    const documents = makeDocuments({ a: 0.6, b: 0.3, c: 0.1 });

    beforeEach(() => {
      tempDir = makeTempDir();
    });

    afterEach(() => {
      removeDir(tempDir);
    });

    it('writes one log per run and a sorted summary', () => {
      const outputDir = path.join(tempDir, 'logs');
      const summaryJson = path.join(tempDir, 'summary.json');
      const result = runSweep({
        base: resolveConfig({ steps: 30, slateSize: 2 }),
        documents,
        runSpecs: ['greedy:epsilon=0', 'ucb:algo=ucb,seed=4'],
        outputDir,
        summaryJson,
      });

      expect(result.runs.map(({ label }) => label)).toEqual(['greedy', 'ucb']);
      expect(result.summaries).toHaveLength(2);
      expect(result.summaries[0].ctr).toBeLessThanOrEqual(result.summaries[1].ctr);

      const greedy = loadLog(path.join(outputDir, 'greedy.json'));
      expect(greedy.log.rounds).toBe(30);
      expect(greedy.metadata).toEqual({
        label: 'greedy',
        algo: 'epsilon',
        model: 'cascade',
        steps: 30,
        seed: 7,
        doc_ids: ['a', 'b', 'c'],
        overrides: { epsilon: '0' },
      });
      expect(loadLog(path.join(outputDir, 'ucb.json')).metadata.seed).toBe(4);

      const written = readJson(summaryJson);
      expect(written).toEqual(JSON.parse(JSON.stringify(result.summaries)));
    });

    it('requires at least one run', () => {
      expect(() =>
        runSweep({ base: resolveConfig(), documents, runSpecs: [], outputDir: tempDir }),
      ).toThrow('At least one run specification is required.');
    });

    it('validates every run before writing anything', () => {
      const outputDir = path.join(tempDir, 'never');
      expect(() =>
        runSweep({
          base: resolveConfig({ steps: 5, slateSize: 2 }),
          documents,
          runSpecs: ['ok:epsilon=0', 'bad:epsilon=x'],
          outputDir,
        }),
      ).toThrow(InvalidConfigurationError);
      expect(fs.existsSync(outputDir)).toBe(false);
    });

    it('rejects duplicate labels before writing anything', () => {
      const outputDir = path.join(tempDir, 'never');
      expect(() =>
        runSweep({
          base: resolveConfig({ steps: 5, slateSize: 2 }),
          documents,
          runSpecs: ['a:epsilon=0', 'a:seed=2'],
          outputDir,
        }),
      ).toThrow("Duplicate run label 'a'.");
      expect(fs.existsSync(outputDir)).toBe(false);
    });

    it('keeps logs inside the output directory', () => {
      const outputDir = path.join(tempDir, 'logs');
      expect(() =>
        runSweep({
          base: resolveConfig({ steps: 5, slateSize: 2 }),
          documents,
          runSpecs: ['../escaped:epsilon=0'],
          outputDir,
        }),
      ).toThrow(InvalidConfigurationError);
      expect(fs.existsSync(path.join(tempDir, 'escaped.json'))).toBe(false);
    });
  });
});
