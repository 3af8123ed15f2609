import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { PinoTemporalLogger } from './temporalLogger.js';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const target = pino(
    { level: 'trace', base: undefined, timestamp: false },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      }
    }
  );
  return { lines, logger: new PinoTemporalLogger(target) };
}

describe('PinoTemporalLogger', () => {
  it('maps Temporal levels onto pino levels', () => {
    const { lines, logger } = capture();

    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((line) => line.level)).toEqual([10, 20, 30, 40, 50]);
    expect(lines.map((line) => line.msg)).toEqual(['t', 'd', 'i', 'w', 'e']);
  });

  it('merges metadata into the log line', () => {
    const { lines, logger } = capture();

    logger.log('INFO', 'Scene video generated', { sequenceNumber: 2, workflowId: 'wf-1' });

    expect(lines).toEqual([{ level: 30, msg: 'Scene video generated', sequenceNumber: 2, workflowId: 'wf-1' }]);
  });
});
