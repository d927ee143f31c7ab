import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

const packageRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');

const PackageJsonSchema = z.object({
  bin: z.record(z.string(), z.string()),
  dependencies: z.record(z.string(), z.string()),
});

describe('modelledger bin entry', () => {
  const pkg = PackageJsonSchema.parse(
    JSON.parse(readFileSync(join(packageRoot, 'package.json'), 'utf-8'))
  );

  it('runs the TypeScript entry point through tsx', () => {
    const entry = pkg.bin.modelledger;
    expect(entry).toBe('./src/bin/modelledger.ts');

    const firstLine = readFileSync(join(packageRoot, entry ?? ''), 'utf-8').split('\n')[0];
    expect(firstLine).toBe('#!/usr/bin/env tsx');
  });

  it('installs tsx alongside the package', () => {
    expect(pkg.dependencies.tsx).toMatch(/^\^4\./);
  });
});
