#!/usr/bin/env node
import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';

import { loadEnvConfig, loadSettings, resolvePreferences } from './config';
import type { PreferencesConfig, Settings } from './config';
import { TrendAnalyzer } from './analysis/trend-analyzer';
import type { TrendAnalysis } from './analysis/schemas';
import { TrendExtractionRunner } from './extraction/runner';
import { getSchema } from './extraction/schemas';
import { CsvExporter } from './export/csv';
import {
  buildOpportunityReport,
  buildRunReport,
  collectStoredReportEntries,
  ReportWriter,
  toReportEntries
} from './report/opportunity-report';
import { OpportunityScorer } from './scoring/opportunity';
import { TrendStore } from './storage/trend-store';
import { describeError } from './utils/errors';
import { Logger } from './utils/logger';
import { GeminiVisionClient } from './vision/gemini-client';

type Command = 'extract' | 'report' | 'models';

const COMMANDS: Command[] = ['extract', 'report', 'models'];

interface CommandContext {
  settings: Settings;
  preferences: PreferencesConfig;
  logger: Logger;
  generator: GeminiVisionClient;
}

function parseCommand(argv: string[]): Command {
  const requested = argv[2] ?? 'extract';
  const command = COMMANDS.find((candidate) => candidate === requested);
  if (!command) {
    throw new Error(`Unknown command "${requested}". Expected one of: ${COMMANDS.join(', ')}`);
  }
  return command;
}

function ensureDirectories(paths: string[]) {
  paths.forEach((path) => {
    const resolved = resolve(process.cwd(), path);
    mkdirSync(resolved, { recursive: true });
  });
}

function summarizeTopKeywords(keywords: string[], limit: number): string[] {
  return keywords.slice(0, limit).map((keyword, index) => `${index + 1}. ${keyword}`);
}

async function runExtract(context: CommandContext, store: TrendStore): Promise<void> {
  const { settings, preferences, logger, generator } = context;

  const runner = new TrendExtractionRunner({
    logger: logger.child('extract'),
    generator,
    schema: getSchema(settings.extraction.variant),
    preferences,
    extraction: settings.extraction
  });

  const extractionStart = Date.now();
  const summary = await runner.run(settings.paths.screenshots_dir);
  if (!summary.capabilityAvailable) {
    return;
  }

  const upsert = await store.upsertTrends(summary.trends);
  logger.info('Extraction complete', {
    screenshots: summary.screenshots.length,
    failedScreenshots: summary.screenshots.filter((result) => result.error !== undefined).length,
    totalExtracted: summary.totalExtracted,
    uniqueTrends: summary.trends.length,
    saved: upsert.saved,
    failed: upsert.failed,
    durationMs: Date.now() - extractionStart
  });

  if (summary.trends.length === 0) {
    logger.warn('No trends extracted; skipping analysis and report');
    return;
  }

  const scorer = new OpportunityScorer({ logger, weights: settings.weights, preferences });
  const ranked = scorer.rank(summary.trends);
  logger.info('Opportunity scoring complete', {
    trendsScored: ranked.length,
    topKeywords: summarizeTopKeywords(
      ranked.map((entry) => entry.trend.keyword),
      settings.report.list_top_n
    )
  });

  let analyses = new Map<string, TrendAnalysis>();
  if (settings.analysis.enabled && settings.analysis.top_n > 0) {
    const analyzer = new TrendAnalyzer({ logger: logger.child('analysis'), generator, preferences });
    analyses = await analyzer.analyzeAll(ranked.slice(0, settings.analysis.top_n).map((entry) => entry.trend));
    await store.saveAnalyses([...analyses.values()]);
  }

  const report = buildRunReport(
    {
      generatedAt: new Date(),
      screenshotsProcessed: summary.screenshots.length,
      model: generator.model,
      trends: summary.trends
    },
    toReportEntries(ranked, analyses, settings.report.top_n)
  );
  process.stdout.write(`${report}\n`);
  new ReportWriter({ logger, outputDir: settings.paths.outputs_dir }).write(report);

  const exporter = new CsvExporter({
    logger,
    config: settings.exporter,
    outputDir: settings.paths.outputs_dir
  });
  const exportPath = exporter.export(ranked, analyses);
  if (exportPath) {
    logger.info('CSV export ready', { outputPath: exportPath });
  }
}

async function runReport(context: CommandContext, store: TrendStore): Promise<void> {
  const { settings, preferences, logger } = context;

  logger.info('Loaded stored trends', { trends: await store.countTrends() });

  const scorer = new OpportunityScorer({ logger, weights: settings.weights, preferences });
  const entries = await collectStoredReportEntries(store, scorer, settings.report.top_n);

  const report = buildOpportunityReport(entries);
  process.stdout.write(`${report}\n`);
  new ReportWriter({ logger, outputDir: settings.paths.outputs_dir }).write(report);
}

async function runModels(context: CommandContext): Promise<void> {
  const { logger, generator } = context;
  if (!generator.enabled) {
    logger.warn('GEMINI_API_KEY not set; cannot list models');
    return;
  }

  const models = await generator.listModels();
  logger.info('Models supporting content generation', { count: models.length });
  models.forEach((model) => {
    process.stdout.write(`${model.name}\t${model.displayName}\n`);
  });
}

async function bootstrap() {
  const command = parseCommand(process.argv);
  const settings = loadSettings();
  const env = loadEnvConfig();
  const preferences = resolvePreferences(settings, env);

  ensureDirectories([settings.paths.data_dir, settings.paths.outputs_dir]);

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });
  const generator = new GeminiVisionClient({
    logger: logger.child('gemini'),
    config: settings.gemini,
    apiKey: env.geminiApiKey,
    model: env.geminiModel
  });

  logger.info('Trend insights bootstrap complete', {
    command,
    model: generator.model,
    variant: settings.extraction.variant,
    screenshotsDir: settings.paths.screenshots_dir,
    hasApiKey: generator.enabled,
    preferredCategories: preferences.preferred_categories
  });

  const context: CommandContext = { settings, preferences, logger, generator };

  if (command === 'models') {
    try {
      await runModels(context);
    } catch (error) {
      logger.error('Model listing failed', { error: describeError(error) });
      process.exitCode = 1;
    }
    return;
  }

  let store: TrendStore | null = null;

  try {
    store = await TrendStore.initialize(settings.paths.db_file, logger.child('store'));

    if (command === 'report') {
      await runReport(context, store);
    } else {
      await runExtract(context, store);
    }
  } catch (error) {
    logger.error('Pipeline execution failed', {
      error: describeError(error)
    });
    throw error;
  } finally {
    if (store) {
      await store.close().catch((error: unknown) => {
        logger.warn('Failed to close trend store cleanly', {
          error: describeError(error)
        });
      });
    }
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', error);
  process.exitCode = 1;
});
