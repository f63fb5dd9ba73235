// Learning catalogue - notebooks per role plus concept explanations

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError } from '../../errors.js';

export const DEFAULT_LEARNING_CATALOG_PATH = fileURLToPath(
  new URL('../../../data/learning-catalog.json', import.meta.url)
);

const learningItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  difficulty: z.enum(['beginner', 'intermediate', 'advanced']),
  estimatedMinutes: z.number().int().positive(),
  concepts: z.array(z.string()),
});

const conceptSchema = z.object({
  title: z.string().min(1),
  simple: z.string(),
  detailed: z.string(),
  example: z.string(),
});

export const learningCatalogSchema = z.object({
  paths: z.record(z.array(learningItemSchema).min(1)),
  concepts: z.record(conceptSchema),
});

export type LearningItem = z.infer<typeof learningItemSchema>;
export type ConceptExplanation = z.infer<typeof conceptSchema>;
export type LearningCatalog = z.infer<typeof learningCatalogSchema>;

/**
 * Read and validate a catalogue file
 */
export async function loadLearningCatalog(filePath = DEFAULT_LEARNING_CATALOG_PATH): Promise<LearningCatalog> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  const parsed = learningCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid learning catalogue ${filePath}`, {
      details: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
    });
  }
  return parsed.data;
}
