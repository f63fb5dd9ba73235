import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { silentLogger } from '../logger.js';
import { ValidationError } from '../errors.js';
import {
  createJsonModelLoader,
  createWeightedModel,
  loadModels,
  toFeatureVector,
  type PredictionModel,
} from './prediction.js';

const modelsDirectory = fileURLToPath(new URL('../../models/', import.meta.url));

const linear = createWeightedModel({
  id: 'toy_linear',
  kind: 'linear',
  features: ['a', 'b'],
  weights: [2, -1],
  bias: 1,
  confidence: 0.6,
});

describe('weighted models', () => {
  it('should compute a linear score', () => {
    expect(linear.predict([3, 4])).toEqual({ value: 3, confidence: 0.6 });
  });

  it('should report a probability for logistic models', () => {
    const model = createWeightedModel({
      id: 'toy_logistic',
      kind: 'logistic',
      features: ['x'],
      weights: [1],
      bias: 0,
      confidence: 0.7,
    });

    expect(model.predict([0])).toEqual({ value: 1, probability: 0.5, confidence: 0.7 });
  });
});

describe('toFeatureVector', () => {
  it('should accept a vector of the right length', () => {
    expect(toFeatureVector(linear, [1, 2])).toEqual([1, 2]);
  });

  it('should reject a vector of the wrong length', () => {
    expect(() => toFeatureVector(linear, [1, 2, 3])).toThrow('Model toy_linear expects 2 features, got 3');
  });

  it('should align named features to the model order', () => {
    expect(toFeatureVector(linear, { b: 5, a: 7, extra: 1 })).toEqual([7, 5]);
  });

  it('should reject missing or non-numeric features', () => {
    expect(() => toFeatureVector(linear, { a: 1 })).toThrow('missing features: b');
    expect(() => toFeatureVector(linear, { a: 1, b: 'two' })).toThrow(ValidationError);
    expect(() => toFeatureVector(linear, 'nope')).toThrow(ValidationError);
  });
});

describe('loadModels', () => {
  it('should keep loading after a failure', async () => {
    const loader = vi.fn(async (id: string): Promise<PredictionModel> => {
      if (id === 'broken') throw new Error('corrupt weights');
      return linear;
    });

    const { models, failures } = await loadModels(['toy_linear', 'broken'], loader, silentLogger);

    expect(Array.from(models.keys())).toEqual(['toy_linear']);
    expect(failures).toEqual([{ modelId: 'broken', error: 'corrupt weights' }]);
  });
});

describe('createJsonModelLoader', () => {
  const loader = createJsonModelLoader(modelsDirectory);

  it('should load a shipped model file', async () => {
    const model = await loader('margin_linear');

    expect(model.featureNames).toEqual(['elo_diff', 'epa_diff', 'talent_diff', 'home_field']);
    const prediction = await model.predict([100, 0.1, 50, 1]);
    expect(prediction.value).toBeCloseTo(9.0);
  });

  it('should refuse ids that are not plain file names', async () => {
    await expect(loader('../secrets')).rejects.toThrow(ValidationError);
  });

  it('should fail for a missing model', async () => {
    await expect(loader('does_not_exist')).rejects.toThrow();
  });
});
