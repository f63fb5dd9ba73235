// Prediction models - loading and feature checking
//
// Models are plain JSON weight files (linear or logistic). Anything else
// can be plugged in through a custom ModelLoader.

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import { ValidationError, errorMessage } from '../errors.js';

export type Prediction = {
  value: number;

  /** Win probability, for classifiers */
  probability?: number;

  /** In [0, 1] */
  confidence?: number;
};

export interface PredictionModel {
  readonly id: string;
  readonly kind: string;

  /** Feature names in the order `predict` expects them */
  readonly featureNames: readonly string[];
  readonly featureCount: number;

  predict(features: number[]): Prediction | Promise<Prediction>;
}

export type ModelLoader = (modelId: string) => Promise<PredictionModel>;

export type ModelLoadFailure = {
  modelId: string;
  error: string;
};

export type LoadedModels = {
  models: Map<string, PredictionModel>;
  failures: ModelLoadFailure[];
};

/**
 * Load every model, collecting failures instead of stopping at the first.
 */
export async function loadModels(
  modelIds: string[],
  loader: ModelLoader,
  logger: Logger = consoleLogger
): Promise<LoadedModels> {
  const settled = await Promise.allSettled(modelIds.map((id) => loader(id)));
  const models = new Map<string, PredictionModel>();
  const failures: ModelLoadFailure[] = [];

  settled.forEach((result, index) => {
    const modelId = modelIds[index];
    if (result.status === 'fulfilled') {
      models.set(modelId, result.value);
    } else {
      failures.push({ modelId, error: errorMessage(result.reason) });
      logger.warn(`Failed to load model ${modelId}`, { error: errorMessage(result.reason) });
    }
  });

  return { models, failures };
}

/**
 * Turn caller-supplied features into the vector `model` expects.
 * Accepts a vector of the right length or an object keyed by feature name.
 *
 * @throws ValidationError when the features do not fit the model
 */
export function toFeatureVector(model: PredictionModel, features: unknown): number[] {
  if (Array.isArray(features)) {
    if (features.length !== model.featureCount) {
      throw new ValidationError(
        `Model ${model.id} expects ${model.featureCount} features, got ${features.length}`,
        { field: 'features' }
      );
    }
    return features.map((value, index) => finiteFeature(model, String(index), value));
  }

  if (typeof features === 'object' && features !== null) {
    const record = new Map(Object.entries(features));
    const missing = model.featureNames.filter((name) => !record.has(name));
    if (missing.length > 0) {
      throw new ValidationError(`Model ${model.id} is missing features: ${missing.join(', ')}`, {
        field: 'features',
      });
    }
    return model.featureNames.map((name) => finiteFeature(model, name, record.get(name)));
  }

  throw new ValidationError(`Model ${model.id} needs a feature vector or a feature object`, {
    field: 'features',
  });
}

function finiteFeature(model: PredictionModel, name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Feature "${name}" for model ${model.id} must be a finite number`, {
      field: `features.${name}`,
    });
  }
  return value;
}

// ============================================================================
// JSON weight files
// ============================================================================

export const modelFileSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(['linear', 'logistic']),
    description: z.string().optional(),
    features: z.array(z.string().min(1)).min(1),
    weights: z.array(z.number()),
    bias: z.number(),
    /** Confidence reported with every prediction */
    confidence: z.number().min(0).max(1).default(0.7),
  })
  .refine((file) => file.weights.length === file.features.length, {
    message: 'weights and features must have the same length',
    path: ['weights'],
  });

export type ModelFile = z.infer<typeof modelFileSchema>;

/**
 * Model computing a weighted sum, passed through the logistic function
 * for classifiers.
 */
export function createWeightedModel(file: ModelFile): PredictionModel {
  return {
    id: file.id,
    kind: file.kind,
    featureNames: Object.freeze([...file.features]),
    featureCount: file.features.length,
    predict(features) {
      const score = features.reduce((sum, value, i) => sum + value * file.weights[i], file.bias);
      if (file.kind === 'logistic') {
        const probability = 1 / (1 + Math.exp(-score));
        return { value: probability >= 0.5 ? 1 : 0, probability, confidence: file.confidence };
      }
      return { value: score, confidence: file.confidence };
    },
  };
}

/**
 * Loader reading `<directory>/<modelId>.json`
 */
export function createJsonModelLoader(directory: string): ModelLoader {
  return async (modelId) => {
    if (!/^[\w.-]+$/.test(modelId)) {
      throw new ValidationError(`Invalid model id "${modelId}"`, { field: 'modelId' });
    }

    const filePath = path.join(directory, `${modelId}.json`);
    const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    const parsed = modelFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        `Model file ${filePath} is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    return createWeightedModel(parsed.data);
  };
}
