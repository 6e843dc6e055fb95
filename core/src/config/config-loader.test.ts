import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ConfigErrorCode } from '../errors/index.js';
import { CONFIG_FIXTURES_ROOT } from '../../tests/fixture-paths.js';
import { loadAlignerConfig, mergeConfigInputs, parseAlignerConfigDocument } from './config-loader.js';

const fixture = (name: string) => resolve(CONFIG_FIXTURES_ROOT, name);

describe('loadAlignerConfig', () => {
  it('resolves a YAML document against the defaults', async () => {
    const config = await loadAlignerConfig(fixture('base.yaml'));
    expect(config.batchSize).toBe(16);
    expect(config.retainNewline).toBe(true);
    expect(config.refinement).toEqual({ wideWindow: 3, narrowWindow: 2, maxWindowTokens: 20, boundaryRadius: 3 });
    expect(config.extendedCut.alignThreshold).toBe(0.4);
    expect(config.extendedCut.trimThreshold).toBe(0.7);
    expect(config.extendedCut.hmm.stayUnaligned).toBe(0.7);
    expect(config.progressWeights.synced).toEqual({ dtwAlign: 0.6, refineWide: 0.3, combine: 0.05, cleanup: 0.05 });
  });

  it('layers later files and explicit overrides on top', async () => {
    const config = await loadAlignerConfig([fixture('base.yaml'), fixture('local.yml')], { retainNewline: false });
    expect(config.batchSize).toBe(8);
    expect(config.dtw.bandRadius).toBe(12);
    expect(config.refinement.maxWindowTokens).toBe(20);
    expect(config.retainNewline).toBe(false);
  });

  it('rejects non-YAML files', async () => {
    await expect(loadAlignerConfig(fixture('aligner.toml'))).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG_FILE_EXTENSION,
    });
  });

  it('wraps read failures', async () => {
    await expect(loadAlignerConfig(fixture('missing.yaml'))).rejects.toMatchObject({
      code: ConfigErrorCode.CONFIG_FILE_LOAD_FAILED,
      location: { filePath: fixture('missing.yaml') },
    });
  });

  it('rejects documents that are not mappings', async () => {
    await expect(loadAlignerConfig(fixture('list.yaml'))).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG_DOCUMENT,
    });
  });

  it('rejects unknown keys', async () => {
    await expect(loadAlignerConfig(fixture('unknown-key.yaml'))).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG_DOCUMENT,
      message: 'Unknown aligner config key "refinement.windowSize".',
    });
  });

  it('rejects values of the wrong type', async () => {
    await expect(loadAlignerConfig(fixture('wrong-type.yaml'))).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_CONFIG_DOCUMENT,
      message: '"batchSize" must be a number.',
    });
  });

  it('validates progress weights after loading', async () => {
    await expect(loadAlignerConfig(fixture('bad-weights.yaml'))).rejects.toMatchObject({
      code: ConfigErrorCode.INVALID_PROGRESS_WEIGHTS,
    });
  });
});

describe('parseAlignerConfigDocument', () => {
  it('reports unknown stage names', () => {
    expect(() => parseAlignerConfigDocument({ progressWeights: { mixed: { render: 1 } } })).toThrow(
      'Unknown stage "render" in progressWeights.mixed.',
    );
  });

  it('drops absent sections', () => {
    expect(parseAlignerConfigDocument({ batchSize: 2 })).toEqual({
      batchSize: 2,
      refinement: {},
      dtw: {},
      extendedCut: { hmm: {} },
    });
  });
});

describe('mergeConfigInputs', () => {
  it('ignores undefined override values', () => {
    const merged = mergeConfigInputs({ dtw: { bandRadius: 5 } }, { dtw: { bandRadius: undefined } });
    expect(merged.dtw).toEqual({ bandRadius: 5 });
  });
});
