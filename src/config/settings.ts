import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';

import { settingsSchema } from './types';
import type { EnvConfig, PreferencesConfig, Settings } from './types';

const cachedSettings = new Map<string, Settings>();

export function parseSettings(contents: string): Settings {
  const parsed: unknown = parse(contents);
  const result = settingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid settings: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Parsed settings, cached per resolved file path. */
export function loadSettings(configPath = resolve(process.cwd(), 'configs', 'settings.yaml')): Settings {
  const resolvedPath = resolve(configPath);
  const cached = cachedSettings.get(resolvedPath);
  if (cached) {
    return cached;
  }

  const settings = parseSettings(readFileSync(resolvedPath, 'utf-8'));
  cachedSettings.set(resolvedPath, settings);
  return settings;
}

/**
 * Environment values win over the YAML file, so a run can be retargeted
 * without editing settings.
 */
export function resolvePreferences(settings: Settings, env: EnvConfig): PreferencesConfig {
  return {
    preferred_categories: env.preferredCategories ?? settings.preferences.preferred_categories,
    target_market: env.targetMarket ?? settings.preferences.target_market,
    budget_constraint: env.budgetConstraint ?? settings.preferences.budget_constraint
  };
}
