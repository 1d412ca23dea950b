/**
 * Levelled logging for the CLI.
 *
 * Every line goes to stderr: stdout is reserved for command output such as
 * the records `extract` prints. Scoped loggers made with `child()` carry a
 * `[scope]` prefix and read the level of the root logger on each call, so
 * `--verbose` and `--quiet` apply to loggers created at import time.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Paint = (text: string) => string;

interface LevelState {
  level: LogLevel;
}

class Logger {
  private readonly state: LevelState;
  private readonly scope: string;

  constructor(state: LevelState = { level: 'info' }, scope = '') {
    this.state = state;
    this.scope = scope;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, `[DEBUG] ${this.scoped(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, `[INFO] ${this.scoped(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, `[WARN] ${this.scoped(message)}`, data);
  }

  error(message: string, cause?: Error | Record<string, unknown>): void {
    const detail = cause instanceof Error ? cause.stack || cause.message : cause;
    this.emit('error', chalk.red, `[ERROR] ${this.scoped(message)}`, detail);
  }

  /** Completion notice, shown at info level. */
  success(message: string): void {
    this.emit('info', chalk.green, `✓ ${message}`);
  }

  /**
   * Logger whose lines are prefixed with `scope` (nested as `parent:scope`).
   * It shares its level with this logger.
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private scoped(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    paint: Paint,
    line: string,
    detail?: string | Record<string, unknown>
  ): void {
    if (SEVERITY[level] < SEVERITY[this.state.level]) return;
    console.error(paint(line));
    if (detail !== undefined) {
      console.error(paint(typeof detail === 'string' ? detail : JSON.stringify(detail, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
