interface LoggerOptions {
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
}

class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    
    if (this.options.json) {
      console.log(JSON.stringify({ level: "info", message, ...data }));
    } else {
      console.log(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    
    if (this.options.json) {
      console.warn(JSON.stringify({ level: "warn", message, ...data }));
    } else {
      console.warn(message);
      if (data) {
        console.dir(data, { depth: null, colors: true });
      }
    }
  }

  /**
   * Diagnostics for --verbose. Written to stderr so that stdout stays a clean
   * stream of documents while tailing.
   */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.options.verbose) return;

    if (this.options.json) {
      console.error(JSON.stringify({ level: "debug", message, ...data }));
    } else {
      console.error(data ? `${message} ${JSON.stringify(data)}` : message);
    }
  }

  /**
   * Log an error message. Errors are always displayed regardless of quiet mode
   * to ensure critical issues are not silently ignored.
   */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message, stack: error.stack } : { error };
      console.error(JSON.stringify({ level: "error", message, ...errorData }));
    } else {
      console.error(message);
      if (error) {
        if (error instanceof Error) {
          console.error(error);
        } else {
          console.dir(error, { depth: null, colors: true });
        }
      }
    }
  }

  setOptions(options: LoggerOptions): void {
    this.options = { ...this.options, ...options };
  }
}

export const logger = new Logger();
