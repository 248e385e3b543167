/**
 * Line-oriented console logging in the CLI's output format
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit DEBUG lines */
  debug: boolean;
  /** Prefix every line with [DRY_RUN] */
  dryRun?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const prefix = options.dryRun ? '[DRY_RUN] ' : '';

  return {
    debug(message: string): void {
      if (options.debug) {
        console.log(`${prefix}DEBUG: ${message}`);
      }
    },
    info(message: string): void {
      console.log(`${prefix}LOG: ${message}`);
    },
    warn(message: string): void {
      console.error(`${prefix}WARN: ${message}`);
    },
    error(message: string): void {
      console.error(`${prefix}ERROR: ${message}`);
    }
  };
}

/**
 * Logger that records lines in memory, for embedding and tests
 */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  debug(message: string): void {
    this.lines.push(`DEBUG: ${message}`);
  }

  info(message: string): void {
    this.lines.push(`LOG: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`WARN: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`ERROR: ${message}`);
  }
}
