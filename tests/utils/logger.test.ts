import { describe, expect, it } from 'vitest';

import { createLogger } from '../../src/utils/logger.js';
import type { LogLevel } from '../../src/schema/index.js';

function capture(level: LogLevel) {
  const lines: string[] = [];
  return { logger: createLogger(level, (line) => lines.push(line)), lines };
}

describe('createLogger', () => {
  it('drops messages below its level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('d');
    logger.info('i');
    logger.login('l');
    logger.warn('w');
    logger.error('e');

    expect(lines).toEqual(['⚠️  w', '💥 e']);
  });

  it('prefixes progress lines with their position', () => {
    const { logger, lines } = capture('info');

    logger.step(0, 3, 'Collection 000001');
    logger.stepResult(0, 3, true, 'Collection 000001');
    logger.stepResult(1, 3, false, 'Collection 000002');

    expect(lines).toEqual([
      '📋 [1/3] Collection 000001',
      '✅ [1/3] Collection 000001',
      '❌ [2/3] Collection 000002',
    ]);
  });

  it('logs failed results at warn level', () => {
    const { logger, lines } = capture('warn');

    logger.stepResult(0, 1, true, 'ok');
    logger.stepResult(0, 1, false, 'bad');

    expect(lines).toEqual(['❌ [1/1] bad']);
  });

  it('shows worker lifecycle only at debug', () => {
    const info = capture('info');
    info.logger.worker('Started worker 42');
    expect(info.lines).toEqual([]);

    const debug = capture('debug');
    debug.logger.worker('Started worker 42');
    expect(debug.lines).toEqual(['🛠️  Started worker 42']);
  });

  it('frames sections with rules', () => {
    const { logger, lines } = capture('info');
    logger.section('Run');
    expect(lines).toEqual([`\n${'─'.repeat(50)}`, '▶  Run', '─'.repeat(50)]);
  });
});
