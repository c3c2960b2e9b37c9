import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { TrendAnalysis } from '../analysis/schemas';
import type { ExporterConfig } from '../config';
import type { RankedTrend } from '../scoring/opportunity';
import type { Logger } from '../utils/logger';
import { formatDate, keywordKey } from '../utils/text';

interface CsvExporterDependencies {
  logger: Logger;
  config: ExporterConfig;
  outputDir: string;
  now?: () => Date;
}

export function formatNumber(value: number | null | undefined, digits = 3): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return '';
  }
  return value.toFixed(digits);
}

export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export const CSV_HEADER = [
  'rank',
  'keyword',
  'opportunity_score',
  'confidence',
  'potential',
  'content_gap',
  'category',
  'search_volume',
  'growth_percentage',
  'overall_score',
  'recommended_action',
  'source',
  'date_extracted'
];

export function buildCsv(ranked: RankedTrend[], analyses: Map<string, TrendAnalysis> = new Map()): string {
  const rows = [CSV_HEADER.join(',')];

  ranked.forEach(({ trend, score }, index) => {
    const analysis = analyses.get(keywordKey(trend.keyword));
    const row = [
      String(index + 1),
      escapeCsv(trend.keyword),
      formatNumber(score),
      formatNumber(trend.confidence, 2),
      escapeCsv(trend.potential),
      trend.contentGapIndicator,
      escapeCsv(trend.category),
      escapeCsv(trend.searchVolume),
      escapeCsv(trend.growthPercentage),
      formatNumber(analysis?.overallScore, 0),
      escapeCsv(analysis?.recommendedAction ?? trend.recommendedActions),
      escapeCsv(trend.sourceIdentifier),
      trend.dateExtracted
    ];
    rows.push(row.join(','));
  });

  return `${rows.join('\n')}\n`;
}

export class CsvExporter {
  constructor(private readonly deps: CsvExporterDependencies) {}

  export(ranked: RankedTrend[], analyses?: Map<string, TrendAnalysis>): string | null {
    if (!this.deps.config.enabled || ranked.length === 0) {
      return null;
    }

    const top = ranked.slice(0, this.deps.config.top_n);
    const stamp = formatDate(this.deps.now?.() ?? new Date());
    const fileName = `${this.deps.config.output_basename}_${stamp}.csv`;
    mkdirSync(this.deps.outputDir, { recursive: true });
    const outputPath = resolve(this.deps.outputDir, fileName);

    writeFileSync(outputPath, buildCsv(top, analyses), 'utf-8');
    this.deps.logger.info('Exported ranked trends CSV', {
      outputPath,
      rows: top.length
    });

    return outputPath;
  }
}
