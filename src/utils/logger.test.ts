import { describe, expect, it } from 'vitest';

import { Logger } from './logger';
import type { LogLevel } from './logger';

function capture(options: { level: LogLevel; format: 'json' | 'pretty' }) {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = new Logger({ ...options, sink: (level, line) => lines.push({ level, line }) });
  return { logger, lines };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn', format: 'json' });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines.map((entry) => entry.level)).toEqual(['warn']);
  });

  it('writes json lines with scope and metadata', () => {
    const { logger, lines } = capture({ level: 'debug', format: 'json' });

    logger.child('store').child('sqlite').info('Trends saved', { saved: 2 });

    const parsed: unknown = JSON.parse(lines[0].line);
    expect(parsed).toMatchObject({
      level: 'info',
      scope: 'store:sqlite',
      message: 'Trends saved',
      metadata: { saved: 2 }
    });
  });

  it('formats pretty lines', () => {
    const { logger, lines } = capture({ level: 'info', format: 'pretty' });

    logger.child('extract').error('Screenshot analysis failed', { fileName: 'a.png' });

    expect(lines[0].line).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[ERROR\] \[extract\] Screenshot analysis failed \{"fileName":"a\.png"\}$/
    );
  });
});
