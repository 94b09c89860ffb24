import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SpecLoader } from '../../src/loaders/spec-loader';
import type { Spec } from '../../src/types/spec';

const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures');

const FixtureCaseSchema = z
  .object({
    name: z.string().min(1),
    data: z.unknown(),
    valid: z.boolean(),
    errors: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
  })
  .strict();

const FixtureCaseFileSchema = z.object({ cases: z.array(FixtureCaseSchema).min(1) }).strict();

export type FixtureCase = z.infer<typeof FixtureCaseSchema>;

const specLoader = new SpecLoader({ baseDir: path.join(FIXTURES_DIR, 'specs') });

export function loadFixtureSpec(filename: string): Promise<Spec> {
  return specLoader.load(filename);
}

export async function loadFixtureCases(filename: string): Promise<FixtureCase[]> {
  const raw = await fs.readFile(path.join(FIXTURES_DIR, 'cases', filename), 'utf-8');
  return FixtureCaseFileSchema.parse(JSON.parse(raw)).cases;
}
