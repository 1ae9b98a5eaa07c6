import { describe, test, expect } from 'vitest';
import pc from 'picocolors';
import { ConsoleLogger, type LogSink } from './console-logger.js';

class CapturingSink implements LogSink {
  readonly out: string[] = [];
  readonly err: string[] = [];

  log(line: string): void {
    this.out.push(line);
  }

  error(line: string): void {
    this.err.push(line);
  }
}

describe('ConsoleLogger', () => {
  test('prefixes each line with its level', () => {
    const sink = new CapturingSink();
    const logger = new ConsoleLogger(sink);

    logger.info('starting');
    logger.success('written');
    logger.warn('odd');
    logger.error('failed');

    expect(sink.out).toEqual([
      `${pc.cyan('INFO')}: starting`,
      `${pc.green('OK')}: written`,
      `${pc.yellow('WARN')}: odd`,
    ]);
    expect(sink.err).toEqual([`${pc.red('ERROR')}: failed`]);
  });
});
