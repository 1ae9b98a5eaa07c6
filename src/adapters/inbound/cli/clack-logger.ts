import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Logger } from '../../../ports/outbound/logger-port.js';

export class ClackLogger implements Logger {
  info(message: string): void {
    p.log.info(message);
  }

  success(message: string): void {
    p.log.success(message);
  }

  warn(message: string): void {
    p.log.warn(pc.yellow(message));
  }

  error(message: string): void {
    p.log.error(pc.red(message));
  }
}
