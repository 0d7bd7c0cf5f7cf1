import { Injectable, LoggerService } from '@nestjs/common';
import pino from 'pino';
import { createLogger } from './pino.config';

/**
 * Bridges Nest's `Logger` facade onto pino.
 *
 * Installed once with `app.useLogger()`; components keep their own
 * `new Logger(Component.name)` handle and the context string ends up as a
 * `context` binding on every record.
 */
@Injectable()
export class AppLoggerService implements LoggerService {
  private readonly logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = logger ?? createLogger();
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    const { context } = this.splitParams(optionalParams);
    this.logger.info({ context }, this.stringify(message));
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    const { context } = this.splitParams(optionalParams);
    this.logger.debug({ context }, this.stringify(message));
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    const { context } = this.splitParams(optionalParams);
    this.logger.trace({ context }, this.stringify(message));
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    const { context } = this.splitParams(optionalParams);
    this.logger.warn({ context }, this.stringify(message));
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    const { context, rest } = this.splitParams(optionalParams);
    const [detail] = rest;

    if (message instanceof Error) {
      this.logger.error({ context, err: message }, message.message);
    } else if (detail instanceof Error) {
      this.logger.error({ context, err: detail }, this.stringify(message));
    } else if (typeof detail === 'string') {
      // Nest passes the stack trace as a plain string
      this.logger.error({ context, stack: detail }, this.stringify(message));
    } else {
      this.logger.error({ context, error: detail }, this.stringify(message));
    }
  }

  fatal(message: unknown, ...optionalParams: unknown[]) {
    const { context } = this.splitParams(optionalParams);
    this.logger.fatal({ context }, this.stringify(message));
  }

  /**
   * Nest appends the logger context as the last string argument.
   */
  private splitParams(params: unknown[]): { context?: string; rest: unknown[] } {
    if (params.length === 0) {
      return { rest: [] };
    }
    const last = params[params.length - 1];
    if (typeof last === 'string') {
      return { context: last, rest: params.slice(0, -1) };
    }
    return { rest: params };
  }

  private stringify(message: unknown): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return message.message;
    return JSON.stringify(message);
  }
}
