import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ACTIONS,
  createTrendRecord,
  dedupeTrends,
  normalizeConfidence,
  normalizeContentGap,
  recordFromDecoded,
  reducePotential
} from './records';
import type { RecordMetadata } from './records';
import { BUSINESS_SCHEMA, MOBILE_APP_SCHEMA } from './schemas';

const metadata: RecordMetadata = {
  sourceIdentifier: 'shots/one.png',
  rawResponse: 'raw',
  extractedAt: new Date(2024, 4, 6)
};

describe('normalizeConfidence', () => {
  it('divides fractions', () => {
    expect(normalizeConfidence('8/10')).toBe(0.8);
    expect(normalizeConfidence('10/10')).toBe(1);
  });

  it('reads bare values on a ten point scale', () => {
    expect(normalizeConfidence('7')).toBe(0.7);
    expect(normalizeConfidence(9)).toBe(0.9);
  });

  it('does not clamp out of range values', () => {
    expect(normalizeConfidence('12')).toBe(1.2);
  });

  it('falls back for unreadable values', () => {
    expect(normalizeConfidence('high')).toBe(0.5);
    expect(normalizeConfidence(undefined)).toBe(0.5);
    expect(normalizeConfidence('3/0')).toBe(0.5);
    expect(normalizeConfidence(null, 0.4)).toBe(0.4);
  });
});

describe('normalizeContentGap', () => {
  it('takes the first level mentioned', () => {
    expect(normalizeContentGap('High opportunity')).toBe('high');
    expect(normalizeContentGap('MEDIUM')).toBe('medium');
    expect(normalizeContentGap('Low to medium')).toBe('low');
  });

  it('defaults to none', () => {
    expect(normalizeContentGap('n/a')).toBe('none');
    expect(normalizeContentGap(undefined)).toBe('none');
  });
});

describe('reducePotential', () => {
  it('keeps the numerator of a fraction', () => {
    expect(reducePotential('8/10')).toBe('8');
    expect(reducePotential('7.5 / 10')).toBe('7.5');
  });

  it('leaves other values trimmed', () => {
    expect(reducePotential(' 7 ')).toBe('7');
    expect(reducePotential('high')).toBe('high');
  });
});

describe('recordFromDecoded', () => {
  it('maps a decoded trend and attaches metadata', () => {
    const record = recordFromDecoded(
      {
        keyword: '  yoga mats ',
        search_volume: 12000,
        confidence: '8/10',
        business_potential: '9/10',
        content_gap_indicator: 'High',
        category: 'fitness'
      },
      BUSINESS_SCHEMA,
      metadata,
      0.5
    );

    expect(record).toEqual({
      keyword: 'yoga mats',
      searchVolume: '12000',
      growthPercentage: 'not shown',
      contentGapIndicator: 'high',
      category: 'fitness',
      trendDescription: '',
      userContext: '',
      confidence: 0.8,
      potential: '9',
      recommendedActions: '',
      dateExtracted: '2024-05-06',
      sourceIdentifier: 'one.png',
      rawResponse: 'raw'
    });
  });

  it('joins list values', () => {
    const record = recordFromDecoded(
      { keyword: 'desk', recommended_actions: ['Post a tour', 'Open a shop'] },
      BUSINESS_SCHEMA,
      metadata,
      0.5
    );

    expect(record?.recommendedActions).toBe('Post a tour; Open a shop');
  });

  it('reads the mobile app potential fields in order', () => {
    const record = recordFromDecoded(
      { keyword: 'habit tracker', mobile_app_potential: '', app_potential: 6 },
      MOBILE_APP_SCHEMA,
      metadata,
      0.5
    );

    expect(record?.potential).toBe('6');
  });

  it('uses the default potential when none is given', () => {
    const record = recordFromDecoded({ keyword: 'desk' }, BUSINESS_SCHEMA, metadata, 0.3);

    expect(record?.potential).toBe('5');
    expect(record?.confidence).toBe(0.3);
  });

  it('rejects elements without a keyword', () => {
    expect(recordFromDecoded({ keyword: '   ' }, BUSINESS_SCHEMA, metadata, 0.5)).toBeNull();
    expect(recordFromDecoded({ category: 'fitness' }, BUSINESS_SCHEMA, metadata, 0.5)).toBeNull();
    expect(recordFromDecoded('yoga mats', BUSINESS_SCHEMA, metadata, 0.5)).toBeNull();
  });
});

describe('createTrendRecord', () => {
  it('reduces a potential fraction and keeps given actions', () => {
    const record = createTrendRecord(
      { keyword: 'plant care', confidence: 0.7, potential: '6/10', recommendedActions: DEFAULT_ACTIONS },
      metadata
    );

    expect(record.potential).toBe('6');
    expect(record.recommendedActions).toBe('Analyze further and create content');
  });
});

describe('dedupeTrends', () => {
  it('keeps the first record per case-insensitive keyword', () => {
    const first = createTrendRecord({ keyword: 'Yoga Mats', confidence: 0.9 }, metadata);
    const duplicate = createTrendRecord({ keyword: 'yoga mats', confidence: 0.4 }, metadata);
    const other = createTrendRecord({ keyword: 'Desk', confidence: 0.6 }, metadata);

    const unique = dedupeTrends([first, duplicate, other]);

    expect(unique.map((record) => record.keyword)).toEqual(['Yoga Mats', 'Desk']);
    expect(unique[0].confidence).toBe(0.9);
  });
});
