import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';

import type { Logger } from '../utils/logger';
import type { ImageInput } from '../vision/types';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg'
};

export interface Screenshot {
  fileName: string;
  path: string;
}

export function mimeTypeFor(fileName: string): string | null {
  return MIME_TYPES[extname(fileName).toLowerCase()] ?? null;
}

/** Image files in `directory`, sorted by name. A missing directory yields none. */
export function listScreenshots(directory: string, logger: Logger): Screenshot[] {
  const resolved = resolve(process.cwd(), directory);
  if (!existsSync(resolved)) {
    logger.warn('Screenshot directory not found', { directory: resolved });
    return [];
  }

  return readdirSync(resolved)
    .filter((fileName) => mimeTypeFor(fileName) !== null)
    .filter((fileName) => statSync(join(resolved, fileName)).isFile())
    .sort()
    .map((fileName) => ({ fileName, path: join(resolved, fileName) }));
}

export function loadScreenshot(screenshot: Screenshot): ImageInput {
  const mimeType = mimeTypeFor(screenshot.fileName);
  if (!mimeType) {
    throw new Error(`Unsupported screenshot type: ${screenshot.fileName}`);
  }
  return {
    mimeType,
    data: readFileSync(screenshot.path).toString('base64')
  };
}
