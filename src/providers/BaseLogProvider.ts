/**
 * Shared behaviour for log providers: level threshold, bound fields,
 * timestamping and the convenience methods. Subclasses only deliver.
 */

import { LOG_LEVELS } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface BaseLogProviderOptions {
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Fields merged into every event. */
  fields?: Record<string, unknown>;
}

export abstract class BaseLogProvider implements ILogProvider {
  private readonly minRank: number;
  private readonly boundFields: Record<string, unknown> | undefined;

  constructor(options?: BaseLogProviderOptions) {
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
    this.boundFields = options?.fields;
  }

  /** Deliver a stamped, filtered event. */
  protected abstract write(event: LogEvent): void;

  abstract flush(): Promise<void>;

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const fields =
      this.boundFields || event.fields
        ? { ...this.boundFields, ...event.fields }
        : undefined;

    this.write({
      ...event,
      ...(fields && { fields }),
      timestamp: event.timestamp ?? new Date().toISOString(),
    });
  }

  child(fields: Record<string, unknown>): ILogProvider {
    return new BoundLogProvider(this, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}

class BoundLogProvider extends BaseLogProvider {
  constructor(
    private readonly target: ILogProvider,
    fields: Record<string, unknown>
  ) {
    super({ fields });
  }

  protected write(event: LogEvent): void {
    this.target.log(event);
  }

  flush(): Promise<void> {
    return this.target.flush();
  }
}
