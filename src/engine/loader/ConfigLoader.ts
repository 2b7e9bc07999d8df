// ─────────────────────────────────────────────
//  ConfigLoader
//  EngineConfig = defaults ← environment ← explicit overrides.
//  A bad env value is reported and the default kept.
// ─────────────────────────────────────────────

import { z } from 'zod';
import { DEFAULT_CONFIG, type EngineConfig } from '@/engine/data/types/Config';

const EnvSchema = {
  HOMESTEAD_DIFFICULTY: z.enum(['easy', 'normal', 'hard']),
  HOMESTEAD_SEED: z.coerce.number().int(),
  HOMESTEAD_SAVE_PATH: z.string().min(1),
  HOMESTEAD_AUTOSAVE_EVERY: z.coerce.number().int().positive(),
};

export interface ConfigResult {
  config: EngineConfig;
  /** One line per rejected environment variable */
  errors: string[];
}

type Env = Record<string, string | undefined>;

function read<T>(env: Env, key: keyof typeof EnvSchema, schema: z.ZodType<T>, errors: string[]): T | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    errors.push(`${key}=${JSON.stringify(raw)}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    return undefined;
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): ConfigResult {
  const errors: string[] = [];
  const config: EngineConfig = { ...DEFAULT_CONFIG };

  const difficulty = read(env, 'HOMESTEAD_DIFFICULTY', EnvSchema.HOMESTEAD_DIFFICULTY, errors);
  if (difficulty !== undefined) config.difficulty = difficulty;

  const seed = read(env, 'HOMESTEAD_SEED', EnvSchema.HOMESTEAD_SEED, errors);
  if (seed !== undefined) config.seed = seed;

  const savePath = read(env, 'HOMESTEAD_SAVE_PATH', EnvSchema.HOMESTEAD_SAVE_PATH, errors);
  if (savePath !== undefined) config.savePath = savePath;

  const autosave = read(env, 'HOMESTEAD_AUTOSAVE_EVERY', EnvSchema.HOMESTEAD_AUTOSAVE_EVERY, errors);
  if (autosave !== undefined) config.autosaveEvery = autosave;

  return { config: { ...config, ...overrides }, errors };
}
