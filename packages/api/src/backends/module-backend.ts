/**
 * JavaScript module backend
 *
 * Accepted module shapes:
 * - `export default function predict(input) {}`
 * - `export default { predict(input) {}, predictBatch?(inputs) {} }`
 * - `export function predict(input) {}` (optionally with `export function predictBatch`)
 *
 * `predict` may be sync or async.
 */

import { pathToFileURL } from 'node:url';
import { ValidationError } from '@modelledger/utils';
import type { ModelBackend } from './model-backend.js';

export type PredictFn = (input: unknown) => unknown;
export type PredictBatchFn = (inputs: unknown[]) => unknown;

export interface ModelModule {
  predict: PredictFn;
  predictBatch?: PredictBatchFn;
}

export class ModuleBackend implements ModelBackend {
  readonly kind = 'module' as const;

  constructor(private readonly module: ModelModule) {}

  async predictBatch(inputs: unknown[]): Promise<unknown[]> {
    if (this.module.predictBatch) {
      const results: unknown = await this.module.predictBatch(inputs);
      if (!Array.isArray(results) || results.length !== inputs.length) {
        throw new ValidationError(
          `predictBatch must return an array of ${inputs.length} results`
        );
      }
      return results;
    }

    const results: unknown[] = [];
    for (const input of inputs) {
      results.push(await this.module.predict(input));
    }
    return results;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function bindFunction(owner: unknown, value: unknown): ((arg: unknown) => unknown) | undefined {
  if (typeof value !== 'function') {
    return undefined;
  }
  return (arg: unknown): unknown => value.call(owner, arg);
}

/**
 * Pick the predict functions out of an imported module namespace
 */
export function toModelModule(namespace: unknown, source: string): ModelModule {
  if (!isRecord(namespace)) {
    throw new ValidationError(`Model module has no exports: ${source}`, { source });
  }

  const defaultExport = namespace['default'];
  const defaultFn = bindFunction(undefined, defaultExport);
  if (defaultFn) {
    return { predict: defaultFn };
  }

  const owner = isRecord(defaultExport) ? defaultExport : namespace;
  const predict = bindFunction(owner, owner['predict']);
  if (!predict) {
    throw new ValidationError(
      `Model module must export a predict function or a default function: ${source}`,
      { source }
    );
  }
  const predictBatch = bindFunction(owner, owner['predictBatch']);
  return predictBatch ? { predict, predictBatch } : { predict };
}

export async function loadModuleBackend(filePath: string): Promise<ModuleBackend> {
  const namespace: unknown = await import(pathToFileURL(filePath).href);
  return new ModuleBackend(toModelModule(namespace, filePath));
}
