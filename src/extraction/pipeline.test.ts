import { describe, expect, it } from 'vitest';

import { extractTrends, runExtractionPipeline } from './pipeline';
import { MOBILE_APP_SCHEMA } from './schemas';

const fixedNow = () => new Date(2024, 4, 6, 12, 0, 0);

describe('runExtractionPipeline', () => {
  it('decodes a fenced json answer in the strict stage', () => {
    const raw = [
      'Analysis:',
      '```json',
      '{"trends_found": [{"keyword": "Yoga Mats", "confidence": "8/10", "business_potential": "9"}, {"keyword": ""}], "total_trends_found": "2"}',
      '```'
    ].join('\n');

    const outcome = runExtractionPipeline(raw, 'one.png', { now: fixedNow });

    expect(outcome.status).toBe('matched');
    expect(outcome.stage).toBe('strict');
    expect(outcome.attempts).toHaveLength(1);
    expect(outcome.attempts[0]).toMatchObject({ status: 'matched', detail: 'fenced-json' });
    expect(outcome.records).toHaveLength(1);
    expect(outcome.records[0]).toMatchObject({
      keyword: 'Yoga Mats',
      confidence: 0.8,
      potential: '9',
      dateExtracted: '2024-05-06',
      sourceIdentifier: 'one.png',
      rawResponse: raw
    });
  });

  it('finds a bare object embedded in prose', () => {
    const raw = 'I found these trends: {"trends_found": [{"keyword": "matcha"}]} Hope it helps!';

    const outcome = runExtractionPipeline(raw, 'two.png', { defaultConfidence: 0.4, now: fixedNow });

    expect(outcome.stage).toBe('strict');
    expect(outcome.records.map((record) => [record.keyword, record.confidence])).toEqual([['matcha', 0.4]]);
  });

  it('treats an empty trend list as a match with no records', () => {
    const outcome = runExtractionPipeline('{"trends_found": []}', 'empty.png', { now: fixedNow });

    expect(outcome).toEqual({
      status: 'matched',
      stage: 'strict',
      records: [],
      attempts: [{ stage: 'strict', status: 'matched', records: [], detail: 'bare-object' }]
    });
  });

  it('falls through to the rescue stage when strict decoding fails', () => {
    const raw =
      'Sure! Here: {"trends_found": [{"keyword": "desk lamp", "confidence": "9/10",},]} and more text {';

    const outcome = runExtractionPipeline(raw, 'three.png', { now: fixedNow });

    expect(outcome.stage).toBe('rescue');
    expect(outcome.attempts.map((attempt) => attempt.status)).toEqual(['malformed', 'matched']);
    expect(outcome.attempts[1]).toMatchObject({ detail: 'container-object (repaired)' });
    expect(outcome.records[0]).toMatchObject({ keyword: 'desk lamp', confidence: 0.9 });
  });

  it('rescues a bare list of objects with a trailing comma', () => {
    const outcome = runExtractionPipeline('Here: [{"keyword":"a"},{"keyword":"b"},] done', 's', { now: fixedNow });

    expect(outcome.stage).toBe('rescue');
    expect(outcome.attempts.map((attempt) => attempt.status)).toEqual(['malformed', 'matched']);
    expect(outcome.attempts[1]).toMatchObject({ detail: 'object-array (repaired)' });
    expect(outcome.records.map((record) => record.keyword)).toEqual(['a', 'b']);
  });

  it('uses the line scan when no json is present', () => {
    const raw = 'Trend: plant care\nCategory: home';

    const outcome = runExtractionPipeline(raw, 'four.png', { heuristicConfidence: 0.6, now: fixedNow });

    expect(outcome.stage).toBe('heuristic');
    expect(outcome.attempts.map((attempt) => attempt.status)).toEqual(['no-match', 'no-match', 'matched']);
    expect(outcome.records[0]).toMatchObject({ keyword: 'plant care', category: 'home', confidence: 0.6 });
  });

  it('reports no-match for prose and empty input', () => {
    for (const raw of ['I could not read the screenshot.', '']) {
      const outcome = runExtractionPipeline(raw, 'five.png', { now: fixedNow });
      expect(outcome.status).toBe('no-match');
      expect(outcome.stage).toBeNull();
      expect(outcome.records).toEqual([]);
      expect(outcome.attempts).toHaveLength(3);
    }
  });

  it('reports malformed when a decoded payload has no trend list', () => {
    const outcome = runExtractionPipeline('{"trends_found": "none"}', 'six.png', { now: fixedNow });

    expect(outcome.status).toBe('malformed');
    expect(outcome.attempts.map((attempt) => attempt.status)).toEqual(['malformed', 'no-match', 'no-match']);
  });

  it('reports malformed when listed trends all lack keywords', () => {
    const outcome = runExtractionPipeline('{"trends_found": [{"category": "fitness"}]}', 'seven.png', {
      now: fixedNow
    });

    expect(outcome.attempts[0]).toEqual({
      stage: 'strict',
      status: 'malformed',
      reason: 'none of 1 listed trends carried a keyword'
    });
  });

  it('reads the potential field of the selected variant', () => {
    const raw = '{"trends_found": [{"keyword": "habit tracker", "mobile_app_potential": "7/10"}]}';

    const outcome = runExtractionPipeline(raw, 'eight.png', { schema: MOBILE_APP_SCHEMA, now: fixedNow });

    expect(outcome.records[0].potential).toBe('7');
  });

  it('is deterministic for the same input', () => {
    const raw = '```json\n{"trends_found": [{"keyword": "a"}, {"keyword": "b"}]}\n```';

    expect(runExtractionPipeline(raw, 'x.png', { now: fixedNow })).toEqual(
      runExtractionPipeline(raw, 'x.png', { now: fixedNow })
    );
  });
});

describe('extractTrends', () => {
  it('returns the records in model order with the file name as source', () => {
    const raw = '[{"keyword": "b"}, {"keyword": "a"}]';

    const records = extractTrends(raw, '/tmp/shots/a.png', { now: fixedNow });

    expect(records.map((record) => record.keyword)).toEqual(['b', 'a']);
    expect(records[0].sourceIdentifier).toBe('a.png');
  });
});
