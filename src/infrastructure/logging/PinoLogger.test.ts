import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { PinoLogger } from './PinoLogger.js';

function createCapture() {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write(msg: string): void {
      lines.push(JSON.parse(msg));
    },
  };
  return { lines, stream };
}

describe('PinoLogger', () => {
  it('should write the message with its data', () => {
    const { lines, stream } = createCapture();
    const logger = new PinoLogger(pino({ level: 'info', base: undefined }, stream));

    logger.info('Connection state changed', { from: 'disconnected', to: 'connected' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'Connection state changed',
      from: 'disconnected',
      to: 'connected',
    });
  });

  it('should drop entries below the configured level', () => {
    const { lines, stream } = createCapture();
    const logger = new PinoLogger(pino({ level: 'warn', base: undefined }, stream));

    logger.debug('Health check failed');
    logger.info('Broker client initialized');
    logger.warn('Operation failed, retrying', { attempt: 1 });

    expect(lines.map((line) => line.msg)).toEqual(['Operation failed, retrying']);
  });

  it('should serialize errors under err and keep non-errors under error', () => {
    const { lines, stream } = createCapture();
    const logger = new PinoLogger(pino({ level: 'info', base: undefined }, stream));

    logger.error('State change handler failed', new Error('boom'), { state: 'connected' });
    logger.fatal('Unexpected failure', 'not an error');

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: 'State change handler failed',
      state: 'connected',
      err: { type: 'Error', message: 'boom' },
    });
    expect(lines[1]).toMatchObject({ level: 60, msg: 'Unexpected failure', error: 'not an error' });
  });

  it('should carry child bindings on every entry', () => {
    const { lines, stream } = createCapture();
    const logger = new PinoLogger(pino({ level: 'info', base: undefined }, stream));

    const child = logger.child({ component: 'ConnectionManager' });
    child.info('Connection manager closed');

    expect(child).toBeInstanceOf(PinoLogger);
    expect(lines[0]).toMatchObject({
      component: 'ConnectionManager',
      msg: 'Connection manager closed',
    });
  });

  it('should build its own pino instance from options', () => {
    const logger = new PinoLogger({ level: 'silent' });

    expect(() => {
      logger.trace('trace');
      logger.warn('warn', { delayMs: 10 });
    }).not.toThrow();
  });
});
