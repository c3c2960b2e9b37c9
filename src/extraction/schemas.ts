import type { PreferencesConfig } from '../config';
import type { SchemaDescriptor, SchemaVariantName } from './types';

export const BUSINESS_SCHEMA: SchemaDescriptor = {
  name: 'business',
  containerKey: 'trends_found',
  requiredFields: ['keyword'],
  potentialFields: ['business_potential', 'potential']
};

export const MOBILE_APP_SCHEMA: SchemaDescriptor = {
  name: 'mobile_app',
  containerKey: 'trends_found',
  requiredFields: ['keyword'],
  potentialFields: ['mobile_app_potential', 'app_potential', 'potential']
};

const SCHEMAS: Record<SchemaVariantName, SchemaDescriptor> = {
  business: BUSINESS_SCHEMA,
  mobile_app: MOBILE_APP_SCHEMA
};

export function getSchema(name: SchemaVariantName): SchemaDescriptor {
  return SCHEMAS[name];
}

function buildPreferenceLines(preferences: PreferencesConfig): string[] {
  const lines: string[] = [];
  if (preferences.preferred_categories.length > 0) {
    lines.push(`- Prioritise these categories: ${preferences.preferred_categories.join(', ')}`);
  }
  if (preferences.target_market) {
    lines.push(`- Target market: ${preferences.target_market}`);
  }
  if (preferences.budget_constraint) {
    lines.push(`- Budget constraint: ${preferences.budget_constraint}`);
  }
  return lines;
}

function framingFor(schema: SchemaDescriptor): { audience: string; potentialLabel: string; extraFields: string[] } {
  if (schema.name === 'mobile_app') {
    return {
      audience: 'an indie mobile app developer',
      potentialLabel: 'mobile app opportunity potential (1-10 scale)',
      extraFields: [
        '"app_concept": "one-line app idea"',
        '"monetization": "subscription/one-time/ads"'
      ]
    };
  }
  return {
    audience: 'a solo entrepreneur',
    potentialLabel: 'business opportunity potential (1-10 scale)',
    extraFields: [
      '"recommended_business_models": ["model1", "model2"]',
      '"target_audience": "description"',
      '"revenue_potential": "$X-$Y monthly estimate"',
      '"implementation_difficulty": "1-10 score"'
    ]
  };
}

export function buildExtractionPrompt(schema: SchemaDescriptor, preferences: PreferencesConfig): string {
  const framing = framingFor(schema);
  const potentialKey = schema.potentialFields[0];
  const preferenceLines = buildPreferenceLines(preferences);

  const fields = [
    '"keyword": "exact trending term"',
    '"search_volume": "number if visible, otherwise \'not shown\'"',
    '"growth_percentage": "% if visible, otherwise \'not shown\'"',
    '"content_gap_indicator": "high/medium/low/none"',
    '"category": "category name"',
    '"trend_description": "why this is trending"',
    '"user_context": "what users want from this trend"',
    `"${potentialKey}": "1-10 score"`,
    ...framing.extraFields,
    '"recommended_actions": "specific next steps"',
    '"confidence": "1-10 how confident you are this is a real trend"'
  ];

  return [
    'Analyze this creator search insights screenshot and extract ALL trending topics/keywords visible.',
    '',
    'For each trend identify the searchable term, search volume and growth percentage when shown,',
    'content gap indicators ("recommended", "opportunity"), its category, and why people search for it.',
    `Rate the ${framing.potentialLabel} for ${framing.audience}.`,
    ...(preferenceLines.length > 0 ? ['', 'Preferences:', ...preferenceLines] : []),
    '',
    'Return the response in this JSON format:',
    '{',
    `  "${schema.containerKey}": [`,
    `    { ${fields.join(', ')} }`,
    '  ],',
    '  "screenshot_quality": "excellent/good/fair/poor",',
    '  "extraction_notes": "any issues or observations",',
    '  "total_trends_found": "number"',
    '}',
    '',
    'Be thorough: extract even small trending topics that might be profitable niches.'
  ].join('\n');
}
