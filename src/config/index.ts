export { loadSettings, parseSettings, resolvePreferences } from './settings';
export { loadEnvConfig, readEnvConfig, parseCategoryList } from './env';
export type {
  Settings,
  PathsConfig,
  LoggingConfig,
  GeminiConfig,
  ExtractionConfig,
  PreferencesConfig,
  WeightsConfig,
  AnalysisConfig,
  ReportConfig,
  ExporterConfig,
  EnvConfig
} from './types';
