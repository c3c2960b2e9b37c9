import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import type { GeminiConfig } from '../config';
import { GenerationError } from '../utils/errors';
import { createHttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import type { ImageInput, ModelInfo, TrendGenerator } from './types';

interface GeminiVisionClientDependencies {
  logger: Logger;
  config: GeminiConfig;
  apiKey?: string;
  /** Overrides the model from settings, e.g. from GEMINI_MODEL. */
  model?: string;
  http?: AxiosInstance;
}

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([])
          })
          .optional(),
        finishReason: z.string().optional()
      })
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional()
});

const listModelsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        displayName: z.string().default(''),
        description: z.string().default(''),
        inputTokenLimit: z.number().optional(),
        outputTokenLimit: z.number().optional(),
        supportedGenerationMethods: z.array(z.string()).default([])
      })
    )
    .default([]),
  nextPageToken: z.string().optional()
});

const apiErrorSchema = z.object({
  error: z.object({ message: z.string() })
});

type GeminiPart = { text: string } | { inline_data: { mime_type: string; data: string } };

function toGenerationError(error: unknown, action: string): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const apiError = apiErrorSchema.safeParse(error.response?.data);
    const message = apiError.success ? apiError.data.error.message : error.message;
    return new GenerationError(`Gemini ${action} failed: ${message}`, error.response?.status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError(`Gemini ${action} failed: ${message}`, undefined, { cause: error });
}

export class GeminiVisionClient implements TrendGenerator {
  private readonly http: AxiosInstance;
  private readonly apiKey: string | null;
  readonly model: string;

  constructor(private readonly deps: GeminiVisionClientDependencies) {
    this.http = deps.http ?? createHttpClient(deps.config.base_url, deps.config.timeout_ms);
    this.apiKey = deps.apiKey ?? null;
    this.model = deps.model ?? deps.config.model;
  }

  get enabled(): boolean {
    return this.apiKey !== null;
  }

  private requireKey(): string {
    if (this.apiKey === null) {
      throw new GenerationError('Gemini API key not configured; set GEMINI_API_KEY in .env');
    }
    return this.apiKey;
  }

  async generate(prompt: string, image?: ImageInput): Promise<string> {
    const key = this.requireKey();
    const parts: GeminiPart[] = [{ text: prompt }];
    if (image) {
      parts.push({ inline_data: { mime_type: image.mimeType, data: image.data } });
    }

    let data: unknown;
    try {
      const response = await this.http.post(
        `/v1beta/models/${encodeURIComponent(this.model)}:generateContent`,
        {
          contents: [{ role: 'user', parts }],
          generationConfig: { temperature: this.deps.config.temperature }
        },
        { params: { key } }
      );
      data = response.data;
    } catch (error) {
      throw toGenerationError(error, 'generateContent');
    }

    const parsed = generateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('Gemini generateContent returned an unexpected payload');
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(`Gemini blocked the prompt: ${blockReason}`);
    }

    const text = (parsed.data.candidates[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    this.deps.logger.debug('Gemini response received', {
      model: this.model,
      characters: text.length,
      finishReason: parsed.data.candidates[0]?.finishReason ?? null
    });

    return text;
  }

  /** Models that support content generation, across all result pages. */
  async listModels(): Promise<ModelInfo[]> {
    const key = this.requireKey();
    const models: ModelInfo[] = [];
    let pageToken: string | undefined;

    do {
      let data: unknown;
      try {
        const response = await this.http.get('/v1beta/models', {
          params: { key, pageSize: 100, pageToken }
        });
        data = response.data;
      } catch (error) {
        throw toGenerationError(error, 'listModels');
      }

      const parsed = listModelsResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new GenerationError('Gemini listModels returned an unexpected payload');
      }

      for (const model of parsed.data.models) {
        if (!model.supportedGenerationMethods.includes('generateContent')) {
          continue;
        }
        models.push({
          name: model.name,
          displayName: model.displayName,
          description: model.description,
          inputTokenLimit: model.inputTokenLimit ?? null,
          outputTokenLimit: model.outputTokenLimit ?? null
        });
      }
      pageToken = parsed.data.nextPageToken;
    } while (pageToken);

    return models;
  }
}
