import type { ExtractionConfig, PreferencesConfig } from '../config';
import { listScreenshots, loadScreenshot } from '../screenshots/scanner';
import type { Screenshot } from '../screenshots/scanner';
import { describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { truncate } from '../utils/text';
import type { TrendGenerator } from '../vision/types';
import { runExtractionPipeline } from './pipeline';
import { dedupeTrends } from './records';
import { buildExtractionPrompt } from './schemas';
import type { ExtractionOutcome, SchemaDescriptor, TrendRecord } from './types';

interface TrendExtractionRunnerDependencies {
  logger: Logger;
  generator: TrendGenerator;
  schema: SchemaDescriptor;
  preferences: PreferencesConfig;
  extraction: ExtractionConfig;
  now?: () => Date;
}

export interface ScreenshotResult {
  fileName: string;
  /** Set when the generation call itself failed. */
  error?: string;
  outcome: ExtractionOutcome | null;
}

export interface ExtractionRunSummary {
  capabilityAvailable: boolean;
  screenshots: ScreenshotResult[];
  totalExtracted: number;
  trends: TrendRecord[];
}

export class TrendExtractionRunner {
  constructor(private readonly deps: TrendExtractionRunnerDependencies) {}

  private async processScreenshot(screenshot: Screenshot, prompt: string): Promise<ScreenshotResult> {
    const { logger } = this.deps;

    let rawResponse: string;
    try {
      rawResponse = await this.deps.generator.generate(prompt, loadScreenshot(screenshot));
    } catch (error) {
      const message = describeError(error);
      logger.error('Screenshot analysis failed', { fileName: screenshot.fileName, error: message });
      return { fileName: screenshot.fileName, error: message, outcome: null };
    }

    if (!rawResponse.trim()) {
      logger.warn('Empty response from model', { fileName: screenshot.fileName });
    }

    const outcome = runExtractionPipeline(rawResponse, screenshot.fileName, {
      schema: this.deps.schema,
      defaultConfidence: this.deps.extraction.default_confidence,
      heuristicConfidence: this.deps.extraction.heuristic_confidence,
      now: this.deps.now
    });

    const metadata = {
      fileName: screenshot.fileName,
      status: outcome.status,
      stage: outcome.stage,
      trends: outcome.records.length,
      attempts: outcome.attempts.map((attempt) => `${attempt.stage}:${attempt.status}`)
    };
    if (outcome.status === 'malformed') {
      logger.warn('Model response could not be recovered', {
        ...metadata,
        excerpt: truncate(rawResponse, 200)
      });
    } else {
      logger.info('Screenshot processed', metadata);
    }

    outcome.records.forEach((record) => {
      logger.debug('Trend extracted', {
        keyword: record.keyword,
        confidence: record.confidence,
        potential: record.potential
      });
    });

    return { fileName: screenshot.fileName, outcome };
  }

  async run(directory: string): Promise<ExtractionRunSummary> {
    const { logger } = this.deps;

    if (!this.deps.generator.enabled) {
      logger.warn('Vision model not available; set GEMINI_API_KEY to enable extraction');
      return { capabilityAvailable: false, screenshots: [], totalExtracted: 0, trends: [] };
    }

    const screenshots = listScreenshots(directory, logger);
    if (screenshots.length === 0) {
      logger.warn('No screenshots found', { directory });
      return { capabilityAvailable: true, screenshots: [], totalExtracted: 0, trends: [] };
    }

    logger.info('Processing screenshots', { count: screenshots.length, model: this.deps.generator.model });

    const prompt = buildExtractionPrompt(this.deps.schema, this.deps.preferences);
    const results: ScreenshotResult[] = [];
    const collected: TrendRecord[] = [];

    for (const screenshot of screenshots) {
      const result = await this.processScreenshot(screenshot, prompt);
      results.push(result);
      collected.push(...(result.outcome?.records ?? []));
    }

    const trends = dedupeTrends(collected);

    logger.info('Extraction summary', {
      screenshotsProcessed: screenshots.length,
      totalTrends: collected.length,
      uniqueTrends: trends.length
    });

    return { capabilityAvailable: true, screenshots: results, totalExtracted: collected.length, trends };
  }
}
