/**
 * Linear model backend
 *
 * Model file format (JSON):
 * { "type": "linear", "weights": [0.5, 1.5], "bias": 0.1 }
 */

import { z } from 'zod';
import { ValidationError } from '@modelledger/utils';
import type { ModelBackend } from './model-backend.js';

export const LinearModelSchema = z.object({
  type: z.literal('linear'),
  weights: z.array(z.number()).min(1),
  bias: z.number().default(0),
});

export type LinearModel = z.infer<typeof LinearModelSchema>;

const FeatureRowSchema = z.array(z.number());

/**
 * Parse a linear model file's contents
 */
export function parseLinearModel(text: string, source: string): LinearModel {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Model file is not valid JSON: ${source}: ${reason}`, { source });
  }

  const result = LinearModelSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'model';
    throw new ValidationError(
      `Unsupported model file: ${source}: ${path}: ${issue?.message ?? 'invalid'}`,
      { source }
    );
  }
  return result.data;
}

export class LinearBackend implements ModelBackend {
  readonly kind = 'linear' as const;

  constructor(private readonly model: LinearModel) {}

  async predictBatch(inputs: unknown[]): Promise<unknown[]> {
    return inputs.map((input) => this.predictOne(input));
  }

  /** Dot product of the feature row with the weights, plus bias */
  predictOne(input: unknown): number {
    const parsed = FeatureRowSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Input must be an array of numbers');
    }
    const row = parsed.data;
    const { weights, bias } = this.model;
    if (row.length !== weights.length) {
      throw new ValidationError(
        `Expected ${weights.length} features, got ${row.length}`,
        { expected: weights.length, actual: row.length }
      );
    }
    return row.reduce((sum, value, i) => sum + value * (weights[i] ?? 0), bias);
  }
}
