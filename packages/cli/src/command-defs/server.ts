/**
 * Server Command Definitions
 */

import { z } from 'zod';

export const serveSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).optional(),
  host: z.string().min(1).optional(),
  modelPath: z.string().min(1).optional(),
  modelName: z.string().min(1).optional(),
  /** Commit hash or "latest" */
  modelVersion: z.string().min(1).optional(),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type ServeArgs = z.infer<typeof serveSchema>;
