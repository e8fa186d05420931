import { LogLevel, loadConfig } from './config';

export interface OutputChannel {
  appendLine(line: string): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

const stderrChannel: OutputChannel = {
  appendLine(line: string) {
    process.stderr.write(`${line}\n`);
  },
};

export class Logger {
  private static channel: OutputChannel | undefined;
  private static level: LogLevel | undefined;

  /**
   * Swap the output channel and/or level. Without arguments, resets to
   * stderr and the level from the environment.
   */
  public static initialize(channel?: OutputChannel, level?: LogLevel) {
    this.channel = channel ?? stderrChannel;
    this.level = level ?? loadConfig().logLevel;
  }

  public static log(message: string, operation?: string) {
    this.write('info', message, operation);
  }

  public static debug(message: string, operation?: string) {
    this.write('debug', message, operation);
  }

  public static error(message: string, error?: unknown) {
    if (!this.enabled('error')) {
      return;
    }
    const timestamp = new Date().toISOString();
    const errStr = error === undefined ? '' : ` ${error instanceof Error ? error.message : String(error)}`;
    this.output().appendLine(`${timestamp} - [ERROR] ${message}${errStr}`);
  }

  private static write(level: LogLevel, message: string, operation?: string) {
    if (!this.enabled(level)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = operation ? `[${operation}] ` : '';
    this.output().appendLine(`${timestamp} - ${prefix}${message}`);
  }

  private static enabled(level: LogLevel): boolean {
    if (this.level === undefined) {
      this.initialize(this.channel);
    }
    return SEVERITY[level] <= SEVERITY[this.level ?? 'error'];
  }

  private static output(): OutputChannel {
    if (!this.channel) {
      this.channel = stderrChannel;
    }
    return this.channel;
  }
}
