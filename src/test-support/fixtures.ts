import type { PreferencesConfig } from '../config';
import type { TrendRecord } from '../extraction/types';
import type { ImageInput, TrendGenerator } from '../vision/types';

export const NO_PREFERENCES: PreferencesConfig = {
  preferred_categories: [],
  target_market: '',
  budget_constraint: ''
};

export function makeTrend(overrides: Partial<TrendRecord> = {}): TrendRecord {
  return {
    keyword: 'yoga mats',
    searchVolume: 'not shown',
    growthPercentage: 'not shown',
    contentGapIndicator: 'none',
    category: '',
    trendDescription: '',
    userContext: '',
    confidence: 0.5,
    potential: '5',
    recommendedActions: '',
    dateExtracted: '2024-05-06',
    sourceIdentifier: 'shot.png',
    rawResponse: '',
    ...overrides
  };
}

export type ScriptedReply = string | Error;

/** Replies in order; an `Error` entry is thrown instead of returned. */
export class ScriptedGenerator implements TrendGenerator {
  readonly calls: Array<{ prompt: string; image?: ImageInput }> = [];
  readonly model = 'scripted-model';
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[], readonly enabled = true) {
    this.replies = [...replies];
  }

  async generate(prompt: string, image?: ImageInput): Promise<string> {
    this.calls.push({ prompt, image });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
