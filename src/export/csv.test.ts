import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { TrendAnalysis } from '../analysis/schemas';
import type { RankedTrend } from '../scoring/opportunity';
import { makeTrend } from '../test-support/fixtures';
import { Logger } from '../utils/logger';
import { buildCsv, CsvExporter, escapeCsv, formatNumber } from './csv';

const HEADER =
  'rank,keyword,opportunity_score,confidence,potential,content_gap,category,search_volume,growth_percentage,overall_score,recommended_action,source,date_extracted';

const components = { confidence: 0, potential: 0, contentGap: 0, preferredCategory: 0 };

const ranked: RankedTrend[] = [
  { trend: makeTrend({ keyword: 'yoga mats', confidence: 0.8, potential: '8' }), score: 2.35, components },
  {
    trend: makeTrend({ keyword: 'lamp, "desk"', recommendedActions: 'Analyze further and create content' }),
    score: 1,
    components
  }
];

const analyses = new Map<string, TrendAnalysis>([
  [
    'yoga mats',
    {
      keyword: 'yoga mats',
      marketSize: 'Unknown',
      growthTrajectory: 'Unknown',
      opportunities: [],
      recommendedAction: 'Publish a free sample plan',
      overallScore: 78,
      generated: true,
      payload: {}
    }
  ]
]);

describe('escapeCsv', () => {
  it('quotes values with separators, quotes or newlines', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
  });
});

describe('formatNumber', () => {
  it('leaves missing values blank', () => {
    expect(formatNumber(0.5)).toBe('0.500');
    expect(formatNumber(null)).toBe('');
    expect(formatNumber(Number.NaN)).toBe('');
  });
});

describe('buildCsv', () => {
  it('writes one row per ranked trend', () => {
    expect(buildCsv(ranked, analyses)).toBe(
      [
        HEADER,
        '1,yoga mats,2.350,0.80,8,none,,not shown,not shown,78,Publish a free sample plan,shot.png,2024-05-06',
        '2,"lamp, ""desk""",1.000,0.50,5,none,,not shown,not shown,,Analyze further and create content,shot.png,2024-05-06',
        ''
      ].join('\n')
    );
  });
});

describe('CsvExporter', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'trend-csv-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  function createExporter(enabled: boolean, topN: number) {
    return new CsvExporter({
      logger: Logger.silent(),
      config: { enabled, output_basename: 'trend_opportunities', top_n: topN },
      outputDir: directory,
      now: () => new Date(2024, 4, 6)
    });
  }

  it('writes the top rows to a dated file', () => {
    const outputPath = createExporter(true, 1).export(ranked, analyses);

    expect(outputPath).toBe(join(directory, 'trend_opportunities_2024-05-06.csv'));
    const lines = readFileSync(join(directory, 'trend_opportunities_2024-05-06.csv'), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1].startsWith('1,yoga mats,')).toBe(true);
  });

  it('skips the export when disabled or empty', () => {
    expect(createExporter(false, 10).export(ranked)).toBeNull();
    expect(createExporter(true, 10).export([])).toBeNull();
    expect(existsSync(join(directory, 'trend_opportunities_2024-05-06.csv'))).toBe(false);
  });
});
