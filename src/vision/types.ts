export interface ImageInput {
  mimeType: string;
  /** Base64 encoded bytes. */
  data: string;
}

export interface ModelInfo {
  name: string;
  displayName: string;
  description: string;
  inputTokenLimit: number | null;
  outputTokenLimit: number | null;
}

/** The external multimodal capability: prompt plus optional image in, text out. */
export interface TrendGenerator {
  readonly enabled: boolean;
  readonly model: string;
  generate(prompt: string, image?: ImageInput): Promise<string>;
}
