import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { TrendAnalysis } from '../analysis/schemas';
import type { TrendRecord } from '../extraction/types';
import type { OpportunityScorer, RankedTrend } from '../scoring/opportunity';
import type { Logger } from '../utils/logger';
import { formatFileStamp, formatTimestamp, keywordKey, normalizeWhitespace } from '../utils/text';

export interface ReportEntry {
  ranked: RankedTrend;
  analysis?: TrendAnalysis;
}

/** Read side of the trend store the report command needs. */
export interface StoredTrendSource {
  getTopTrends(limit: number): Promise<TrendRecord[]>;
  getAnalyses(): Promise<Map<string, TrendAnalysis>>;
}

export interface RunReportSummary {
  generatedAt: Date;
  screenshotsProcessed: number;
  model: string;
  trends: TrendRecord[];
}

const RULE = '='.repeat(60);

export const CLOSING_RECOMMENDATIONS = [
  'Focus on trends with 70+ overall scores',
  'Start with digital products (fastest to market)',
  'Create content immediately to build authority',
  'Monitor trend progression weekly',
  'Scale successful ventures into SaaS/courses'
];

export function toReportEntries(
  ranked: RankedTrend[],
  analyses: Map<string, TrendAnalysis>,
  limit: number
): ReportEntry[] {
  return ranked.slice(0, limit).map((entry) => ({
    ranked: entry,
    analysis: analyses.get(keywordKey(entry.trend.keyword))
  }));
}

/**
 * Report entries for stored trends. Twice `topN` of the most confident trends
 * are read, then scoring decides the final order.
 */
export async function collectStoredReportEntries(
  source: StoredTrendSource,
  scorer: OpportunityScorer,
  topN: number
): Promise<ReportEntry[]> {
  const candidates = await source.getTopTrends(topN * 2);
  const analyses = await source.getAnalyses();
  return toReportEntries(scorer.rank(candidates), analyses, topN);
}

function orUnknown(value: string | undefined): string {
  return value && value.trim() ? normalizeWhitespace(value) : 'Unknown';
}

function renderEntry(entry: ReportEntry, position: number): string[] {
  const { trend, score } = entry.ranked;
  const analysis = entry.analysis;
  const lines = [
    `#${position} ${trend.keyword.toUpperCase()}`,
    `   Confidence: ${trend.confidence.toFixed(2)}/1.0`,
    `   Potential: ${orUnknown(trend.potential)}/10`,
    `   Overall Score: ${analysis?.overallScore ?? 'Unknown'}/100`,
    `   Opportunity Score: ${score.toFixed(3)}`,
    `   Trend Description: ${trend.trendDescription ? normalizeWhitespace(trend.trendDescription) : 'Not available'}`
  ];

  const top = analysis?.opportunities[0];
  if (top) {
    lines.push(`   Top Opportunity: ${top.description ?? 'Create content'}`);
    lines.push(`   Revenue Potential: ${orUnknown(top.revenue_potential)}`);
    lines.push(`   Launch Time: ${orUnknown(top.time_to_launch)}`);
  }

  const nextAction = analysis?.recommendedAction || trend.recommendedActions || 'Research further';
  lines.push(`   Next Action: ${nextAction}`);
  return lines;
}

export function buildOpportunityReport(entries: ReportEntry[]): string {
  const lines = ['TREND OPPORTUNITY REPORT', RULE, ''];

  if (entries.length === 0) {
    lines.push('No trends available. Run an extraction first.', '');
  }

  entries.forEach((entry, index) => {
    lines.push(...renderEntry(entry, index + 1), '');
  });

  lines.push('RECOMMENDATIONS:');
  CLOSING_RECOMMENDATIONS.forEach((recommendation, index) => {
    lines.push(`${index + 1}. ${recommendation}`);
  });

  return `${lines.join('\n')}\n`;
}

/** Run header and extracted trend list, followed by the opportunity report. */
export function buildRunReport(summary: RunReportSummary, entries: ReportEntry[]): string {
  const lines = [
    'TREND ANALYSIS RUN',
    RULE,
    '',
    `Analysis Date: ${formatTimestamp(summary.generatedAt)}`,
    `Screenshots Processed: ${summary.screenshotsProcessed}`,
    `Trends Extracted: ${summary.trends.length}`,
    `AI Model: ${summary.model}`,
    '',
    'EXTRACTED TRENDS SUMMARY:',
    '-'.repeat(30)
  ];

  summary.trends.forEach((trend) => {
    lines.push(`- ${trend.keyword} (confidence: ${trend.confidence.toFixed(2)})`);
  });

  return `${lines.join('\n')}\n\n${buildOpportunityReport(entries)}`;
}

interface ReportWriterDependencies {
  logger: Logger;
  outputDir: string;
  now?: () => Date;
}

export class ReportWriter {
  constructor(private readonly deps: ReportWriterDependencies) {}

  write(contents: string): string {
    const stamp = formatFileStamp(this.deps.now?.() ?? new Date());
    mkdirSync(this.deps.outputDir, { recursive: true });
    const outputPath = resolve(this.deps.outputDir, `opportunity_report_${stamp}.txt`);
    writeFileSync(outputPath, contents, 'utf-8');
    this.deps.logger.info('Opportunity report saved', { outputPath });
    return outputPath;
  }
}
