import { describe, expect, it } from 'vitest';

import { NO_PREFERENCES } from '../test-support/fixtures';
import { buildExtractionPrompt, getSchema } from './schemas';

describe('buildExtractionPrompt', () => {
  it('asks for the business potential field', () => {
    const prompt = buildExtractionPrompt(getSchema('business'), NO_PREFERENCES);

    expect(prompt).toContain('"business_potential": "1-10 score"');
    expect(prompt).not.toContain('Preferences:');
  });

  it('asks for the mobile app potential field', () => {
    const prompt = buildExtractionPrompt(getSchema('mobile_app'), NO_PREFERENCES);

    expect(prompt).toContain('"mobile_app_potential": "1-10 score"');
    expect(prompt).toContain('an indie mobile app developer');
  });

  it('lists the preferences', () => {
    const prompt = buildExtractionPrompt(getSchema('business'), {
      preferred_categories: ['fitness', 'home'],
      target_market: 'students',
      budget_constraint: ''
    });

    expect(prompt).toContain('Preferences:\n- Prioritise these categories: fitness, home\n- Target market: students\n');
  });
});
