import { describe, expect, it } from 'vitest';

import { listFromDecoded, rescueTrendList } from './rescue';
import { BUSINESS_SCHEMA } from './schemas';

describe('rescueTrendList', () => {
  it('repairs trailing commas inside a container object', () => {
    const raw =
      'Sure! Here: {"trends_found": [{"keyword": "desk lamp", "confidence": "9/10",},]} and more text {';

    expect(rescueTrendList(raw, BUSINESS_SCHEMA)).toEqual({
      spans: 1,
      candidate: {
        pattern: 'container-object',
        repaired: true,
        items: [{ keyword: 'desk lamp', confidence: '9/10' }]
      }
    });
  });

  it('straightens typographic quotes in values', () => {
    const raw = '{"trends_found": [{"keyword": “vinyl decor”}]}';

    const scan = rescueTrendList(raw, BUSINESS_SCHEMA);
    expect(scan.candidate).toEqual({
      pattern: 'container-object',
      repaired: true,
      items: [{ keyword: 'vinyl decor' }]
    });
  });

  it('decodes only the balanced span past nested arrays', () => {
    const raw = '{"trends_found": [{"keyword": "a", "tags": ["x"]}]} trailing';

    expect(rescueTrendList(raw, BUSINESS_SCHEMA)).toEqual({
      spans: 1,
      candidate: {
        pattern: 'container-object',
        repaired: false,
        items: [{ keyword: 'a', tags: ['x'] }]
      }
    });
  });

  it('takes the leftmost array of objects carrying a keyword', () => {
    const raw = 'Trends: [{"keyword": "plant care"}] then [{"other": 1}]';

    expect(rescueTrendList(raw, BUSINESS_SCHEMA).candidate).toEqual({
      pattern: 'object-array',
      repaired: false,
      items: [{ keyword: 'plant care' }]
    });
  });

  it('repairs a bare array of objects ending in a trailing comma', () => {
    const raw = 'Here: [{"keyword":"a"},{"keyword":"b"},] done';

    expect(rescueTrendList(raw, BUSINESS_SCHEMA)).toEqual({
      spans: 1,
      candidate: {
        pattern: 'object-array',
        repaired: true,
        items: [{ keyword: 'a' }, { keyword: 'b' }]
      }
    });
  });

  it('decodes one span for a long list with nested arrays and one syntax error', () => {
    const items = Array.from({ length: 400 }, (_, index) => `{"keyword": "k${index}", "tags": [{"n": ${index}}]}`);
    const raw = `{"trends_found": [${items.join(', ')},]}`;

    const scan = rescueTrendList(raw, BUSINESS_SCHEMA);

    expect(scan.spans).toBe(1);
    expect(scan.candidate?.repaired).toBe(true);
    expect(scan.candidate?.items).toHaveLength(400);
  });

  it('skips an opener whose brackets never close', () => {
    const raw = '{"trends_found": [{"keyword": "cut off"';

    expect(rescueTrendList(raw, BUSINESS_SCHEMA)).toEqual({ spans: 0, candidate: null });
  });

  it('reports nothing for plain prose', () => {
    expect(rescueTrendList('no json here', BUSINESS_SCHEMA)).toEqual({ spans: 0, candidate: null });
  });
});

describe('listFromDecoded', () => {
  it('accepts a top-level list or the container key', () => {
    expect(listFromDecoded([{ keyword: 'a' }], 'trends_found')).toEqual([{ keyword: 'a' }]);
    expect(listFromDecoded({ trends_found: [1] }, 'trends_found')).toEqual([1]);
  });

  it('rejects other shapes', () => {
    expect(listFromDecoded({ trends_found: 'none' }, 'trends_found')).toBeNull();
    expect(listFromDecoded(5, 'trends_found')).toBeNull();
  });
});
