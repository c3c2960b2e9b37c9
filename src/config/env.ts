import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import type { EnvConfig } from './types';

let cachedEnv: EnvConfig | null = null;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseCategoryList(value: string | undefined): string[] | undefined {
  const trimmed = optional(value);
  if (!trimmed) {
    return undefined;
  }
  return trimmed
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function readEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  return {
    geminiApiKey: optional(source.GEMINI_API_KEY),
    geminiModel: optional(source.GEMINI_MODEL),
    preferredCategories: parseCategoryList(source.PREFERRED_CATEGORIES),
    targetMarket: optional(source.TARGET_MARKET),
    budgetConstraint: optional(source.BUDGET_CONSTRAINT)
  };
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = readEnvConfig(process.env);
  return cachedEnv;
}
