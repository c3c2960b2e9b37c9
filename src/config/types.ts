import { z } from 'zod';

export const pathsConfigSchema = z.object({
  screenshots_dir: z.string().default('screenshots'),
  data_dir: z.string().default('data'),
  outputs_dir: z.string().default('outputs'),
  db_file: z.string().default('data/trend_insights.db')
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('pretty')
});

export const geminiConfigSchema = z.object({
  base_url: z.string().default('https://generativelanguage.googleapis.com'),
  model: z.string().default('gemini-1.5-flash'),
  timeout_ms: z.number().int().positive().default(90000),
  temperature: z.number().min(0).max(2).default(0.2)
});

export const extractionConfigSchema = z.object({
  variant: z.enum(['business', 'mobile_app']).default('business'),
  default_confidence: z.number().default(0.5),
  heuristic_confidence: z.number().default(0.7)
});

export const preferencesConfigSchema = z.object({
  preferred_categories: z.array(z.string()).default([]),
  target_market: z.string().default(''),
  budget_constraint: z.string().default('')
});

export const weightsConfigSchema = z.object({
  confidence: z.number().default(1),
  potential: z.number().default(1),
  content_gap: z.number().default(0.5),
  preferred_category: z.number().default(0.25)
});

export const analysisConfigSchema = z.object({
  enabled: z.boolean().default(true),
  top_n: z.number().int().nonnegative().default(5)
});

export const reportConfigSchema = z.object({
  top_n: z.number().int().positive().default(5),
  list_top_n: z.number().int().positive().default(7)
});

export const exporterConfigSchema = z.object({
  enabled: z.boolean().default(true),
  output_basename: z.string().default('trend_opportunities'),
  top_n: z.number().int().positive().default(50)
});

export const settingsSchema = z.object({
  paths: pathsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  gemini: geminiConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  preferences: preferencesConfigSchema.default({}),
  weights: weightsConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  report: reportConfigSchema.default({}),
  exporter: exporterConfigSchema.default({})
});

export type PathsConfig = z.infer<typeof pathsConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type GeminiConfig = z.infer<typeof geminiConfigSchema>;
export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;
export type PreferencesConfig = z.infer<typeof preferencesConfigSchema>;
export type WeightsConfig = z.infer<typeof weightsConfigSchema>;
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type ReportConfig = z.infer<typeof reportConfigSchema>;
export type ExporterConfig = z.infer<typeof exporterConfigSchema>;
export type Settings = z.infer<typeof settingsSchema>;

export interface EnvConfig {
  geminiApiKey?: string;
  geminiModel?: string;
  preferredCategories?: string[];
  targetMarket?: string;
  budgetConstraint?: string;
}
