import pc from 'picocolors';
import type { Logger } from '../../../ports/outbound/logger-port.js';

export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

/**
 * Level-prefixed single lines, for CloudWatch Logs when running in Lambda.
 */
export class ConsoleLogger implements Logger {
  constructor(private sink: LogSink = console) {}

  info(message: string): void {
    this.sink.log(`${pc.cyan('INFO')}: ${message}`);
  }

  success(message: string): void {
    this.sink.log(`${pc.green('OK')}: ${message}`);
  }

  warn(message: string): void {
    this.sink.log(`${pc.yellow('WARN')}: ${message}`);
  }

  error(message: string): void {
    this.sink.error(`${pc.red('ERROR')}: ${message}`);
  }
}
