/**
 * Pick a backend for a model file by its extension.
 * Unknown extensions are read as linear JSON models.
 */

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError } from '@modelledger/utils';
import { logger } from '../logger.js';
import type { ModelBackend } from './model-backend.js';
import { LinearBackend, parseLinearModel } from './linear-backend.js';
import { loadModuleBackend } from './module-backend.js';

const MODULE_EXTENSIONS = new Set(['.mjs', '.js']);

async function requireFile(filePath: string): Promise<void> {
  try {
    const stats = await stat(filePath);
    if (stats.isFile()) {
      return;
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
  throw new ConfigurationError(`Model file not found: ${filePath}`, 'MODEL_PATH');
}

export async function loadModelBackend(filePath: string): Promise<ModelBackend> {
  await requireFile(filePath);
  const ext = path.extname(filePath).toLowerCase();

  if (MODULE_EXTENSIONS.has(ext)) {
    logger.debug('Loading module model', { filePath });
    return loadModuleBackend(filePath);
  }

  if (ext !== '.json') {
    logger.warn('Unknown model file extension, reading as JSON', { filePath, ext });
  }
  const text = await readFile(filePath, 'utf8');
  return new LinearBackend(parseLinearModel(text, filePath));
}
