/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes to stdout/stderr.
 */

import { BaseLogProvider, type BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface ConsoleLogProviderOptions extends BaseLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Inspectable buffer of all delivered events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    super(options);
    this.outputToConsole = options?.outputToConsole ?? false;
  }

  protected write(event: LogEvent): void {
    this.events.push(event);

    if (this.outputToConsole) {
      const prefix = `[${event.level.toUpperCase()}]`;
      const fieldsStr = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
      const line = `${prefix} ${event.message}${fieldsStr}`;
      if (event.level === 'error' || event.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
