// Built-in agents

import type { AgentDefinition } from '../types.js';
import { LEARNING_NAVIGATOR_TYPE, createLearningNavigatorDefinition } from './learning-navigator.js';
import { MODEL_ENGINE_TYPE, createModelEngineDefinition } from './model-engine.js';
import { INSIGHT_GENERATOR_TYPE, createInsightGeneratorDefinition } from './insight-generator.js';
import { DATA_ACQUISITION_TYPE, createDataAcquisitionDefinition, type SportsDataSource } from './data-acquisition.js';
import { QUALITY_ASSURANCE_TYPE, createQualityAssuranceDefinition } from './quality-assurance.js';
import type { ModelLoader } from '../../external/prediction.js';

export * from './learning-catalog.js';
export * from './learning-navigator.js';
export * from './model-engine.js';
export * from './insight-generator.js';
export * from './data-acquisition.js';
export * from './quality-assurance.js';

export type BuiltinAgentOptions = {
  catalogPath?: string;
  modelsDirectory?: string;
  modelLoader?: ModelLoader;
  modelIds?: string[];

  /** Without one, data acquisition registers with its capabilities unavailable */
  sportsData?: SportsDataSource;

  /** Below this confidence the reviewer rejects */
  reviewThreshold?: number;
};

/**
 * Definitions for every built-in agent type, keyed by type
 */
export function createBuiltinAgentDefinitions(options: BuiltinAgentOptions = {}): Record<string, AgentDefinition> {
  return {
    [LEARNING_NAVIGATOR_TYPE]: createLearningNavigatorDefinition({ catalogPath: options.catalogPath }),
    [MODEL_ENGINE_TYPE]: createModelEngineDefinition({
      loader: options.modelLoader,
      modelIds: options.modelIds,
      modelsDirectory: options.modelsDirectory,
    }),
    [INSIGHT_GENERATOR_TYPE]: createInsightGeneratorDefinition(),
    [DATA_ACQUISITION_TYPE]: createDataAcquisitionDefinition({ source: options.sportsData }),
    [QUALITY_ASSURANCE_TYPE]: createQualityAssuranceDefinition({ threshold: options.reviewThreshold }),
  };
}
