/**
 * Model Command Definitions
 */

import { z } from 'zod';

const formatOption = z.enum(['json', 'table', 'csv']).default('table');

export const modelsStoreSchema = z.object({
  modelPath: z.string().min(1),
  modelName: z.string().min(1),
  format: formatOption,
});

export const modelsLoadSchema = z.object({
  /** Commit hash or "latest" */
  selector: z.string().min(1),
  outputPath: z.string().min(1),
  modelName: z.string().min(1).optional(),
  format: formatOption,
});

export const modelsListSchema = z.object({
  modelName: z.string().min(1).optional(),
  format: formatOption,
});

export const modelsRollbackSchema = z.object({
  commitHash: z.string().min(1),
  modelName: z.string().min(1),
  format: formatOption,
});

export const modelsVerifySchema = z.object({
  modelName: z.string().min(1).optional(),
  format: formatOption,
});

export type ModelsStoreArgs = z.infer<typeof modelsStoreSchema>;
export type ModelsLoadArgs = z.infer<typeof modelsLoadSchema>;
export type ModelsListArgs = z.infer<typeof modelsListSchema>;
export type ModelsRollbackArgs = z.infer<typeof modelsRollbackSchema>;
export type ModelsVerifyArgs = z.infer<typeof modelsVerifySchema>;
