// Model engine - game predictions from loaded models
//
// Each capability names the models it needs. A model that failed to load
// makes only those capabilities unavailable.

import { fileURLToPath } from 'node:url';
import type { Params } from '@huddle/protocol';
import { BaseAgent, stringParam } from '../base-agent.js';
import type { AgentCapabilitySpec } from '../base-agent.js';
import type { AgentDefinition } from '../types.js';
import { AgentUnavailableError, ValidationError } from '../../errors.js';
import {
  createJsonModelLoader,
  loadModels,
  toFeatureVector,
  type LoadedModels,
  type ModelLoader,
  type Prediction,
  type PredictionModel,
} from '../../external/prediction.js';

export const MODEL_ENGINE_TYPE = 'model_engine';

export const DEFAULT_MODELS_DIRECTORY = fileURLToPath(new URL('../../../models/', import.meta.url));
export const DEFAULT_PRIMARY_MODEL = 'home_win_logistic';
export const DEFAULT_MODEL_IDS = ['home_win_logistic', 'margin_linear'];

export type ModelEngineOptions = {
  agentId: string;
  loaded: LoadedModels;

  /** Model used by predict_game_outcome unless the caller names one */
  primaryModelId?: string;
};

export class ModelEngineAgent extends BaseAgent {
  constructor(options: ModelEngineOptions) {
    const { models, failures } = options.loaded;
    const primaryModelId = options.primaryModelId ?? DEFAULT_PRIMARY_MODEL;
    const failureFor = (id: string) => failures.find((f) => f.modelId === id)?.error ?? 'not loaded';

    const needs = (
      modelIds: string[],
      minimum = modelIds.length
    ): Pick<AgentCapabilitySpec, 'available' | 'unavailableReason'> => {
      const missing = modelIds.filter((id) => !models.has(id));
      if (modelIds.length - missing.length >= minimum) return { available: true };
      return {
        available: false,
        unavailableReason:
          missing.length > 0
            ? missing.map((id) => `model ${id}: ${failureFor(id)}`).join('; ')
            : `needs at least ${minimum} models`,
      };
    };

    super({
      agentType: MODEL_ENGINE_TYPE,
      agentId: options.agentId,
      name: 'Model Engine',
      permissionLevel: 'read_execute_write',
      expertiseDomains: ['predictions', 'modeling'],
      capabilities: [
        {
          name: 'predict_game_outcome',
          description: 'Predict a game with a trained model',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 2000,
          toolsRequired: ['prediction_models'],
          dataAccess: ['model_pack'],
          domainTags: ['predictions'],
          ...needs([primaryModelId]),
          handler: async (params) => predictGameOutcome(models, primaryModelId, params),
        },
        {
          name: 'compare_models',
          description: 'Run every loaded model on the same game',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 4000,
          toolsRequired: ['prediction_models'],
          domainTags: ['modeling', 'predictions'],
          ...needs(Array.from(new Set([...models.keys(), ...failures.map((f) => f.modelId)])), 2),
          handler: async (params) => compareModels(models, params),
        },
        {
          name: 'list_models',
          description: 'List loaded models and load failures',
          requiredPermission: 'read_only',
          executionTimeEstimateMs: 100,
          domainTags: ['modeling'],
          handler: async () => ({
            models: Array.from(models.values(), describeModel),
            failures: failures.map((f) => ({ ...f })),
          }),
        },
      ],
    });
  }
}

async function predictGameOutcome(models: Map<string, PredictionModel>, primaryModelId: string, params: Params) {
  const homeTeam = stringParam(params, 'homeTeam');
  const awayTeam = stringParam(params, 'awayTeam');
  if (!homeTeam || !awayTeam) {
    throw new ValidationError('predict_game_outcome needs "homeTeam" and "awayTeam"', { field: 'homeTeam' });
  }

  const modelId = stringParam(params, 'modelId', primaryModelId);
  const model = models.get(modelId);
  if (!model) {
    throw new AgentUnavailableError(`model ${modelId}`, 'model is not loaded');
  }

  const prediction = await model.predict(toFeatureVector(model, params.features));
  return {
    homeTeam,
    awayTeam,
    modelUsed: model.id,
    prediction,
    confidence: prediction.confidence ?? 0.5,
  };
}

async function compareModels(models: Map<string, PredictionModel>, params: Params) {
  const results: Array<{ modelId: string; kind: string; prediction: Prediction }> = [];
  for (const model of models.values()) {
    const prediction = await model.predict(toFeatureVector(model, params.features));
    results.push({ modelId: model.id, kind: model.kind, prediction });
  }

  const confidences = results.map((r) => r.prediction.confidence ?? 0);
  return {
    comparisons: results,
    mostConfident: results.length > 0 ? results[confidences.indexOf(Math.max(...confidences))].modelId : null,
    confidence: confidences.length > 0 ? Math.max(...confidences) : 0,
  };
}

function describeModel(model: PredictionModel) {
  return { id: model.id, kind: model.kind, features: [...model.featureNames] };
}

export function createModelEngineDefinition(
  options: { loader?: ModelLoader; modelIds?: string[]; primaryModelId?: string; modelsDirectory?: string } = {}
): AgentDefinition {
  return {
    description: 'Game outcome predictions from trained models',
    factory: async ({ agentId, logger }) => {
      const loader = options.loader ?? createJsonModelLoader(options.modelsDirectory ?? DEFAULT_MODELS_DIRECTORY);
      const loaded = await loadModels(options.modelIds ?? DEFAULT_MODEL_IDS, loader, logger);
      return new ModelEngineAgent({ agentId, loaded, primaryModelId: options.primaryModelId });
    },
  };
}
