import { StructuredLogger, isLogLevel } from '../src/logger';
import { LogEntry, LogLevel } from '../src/logger';

function collect(minLevel: LogLevel = 'info') {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger('shiftgate', {
    minLevel,
    sink: (_level, line) => {
      entries.push(JSON.parse(line));
    },
    now: () => new Date('2024-05-01T12:00:00.000Z'),
  });
  return { logger, entries };
}

describe('StructuredLogger', () => {
  it('should write JSON entries with service, component and context', () => {
    const { logger, entries } = collect();

    logger.withComponent('workflow-runner').info('Running step', { step: 'preflight' });

    expect(entries).toEqual([
      {
        timestamp: '2024-05-01T12:00:00.000Z',
        level: 'info',
        service: 'shiftgate',
        component: 'workflow-runner',
        message: 'Running step',
        context: { step: 'preflight' },
      },
    ]);
  });

  it('should drop entries below the minimum level', () => {
    const { logger, entries } = collect('warn');

    logger.info('ignored');
    logger.warn('kept');

    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });

  it('should attach error details', () => {
    const { logger, entries } = collect();

    logger.error('Step failed', new Error('boom'), { step: 'cdc_check' });
    logger.error('Odd failure', 'plain string');

    expect(entries[0].error?.name).toBe('Error');
    expect(entries[0].error?.message).toBe('boom');
    expect(entries[1].error).toEqual({ name: 'UnknownError', message: 'plain string' });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
