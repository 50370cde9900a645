/**
 * Structured Logging Service
 *
 * Every line is scoped to a request ID and a step name, e.g.
 * `[2026-01-01 10:00:00] [REQ-1a2b3c4d] SCAN_START`, followed by
 * indented key/value data.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Tag = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS';
type Sink = (line: string) => void;

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'silent':
      return 'silent';
    default:
      return 'info';
  }
}

export class Logger {
  private colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
  };

  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Generate unique request ID for tracking
   * Format: REQ-{8 random hex chars}
   */
  generateRequestId(): string {
    return `REQ-${Math.random().toString(16).slice(2, 10).padEnd(8, '0')}`;
  }

  /**
   * Log info message with optional data and duration
   *
   * @param step - Step name (e.g., 'SCAN_START', 'FETCH_SUCCESS')
   * @param startTime - Start timestamp for duration calculation
   */
  info(requestId: string, step: string, data?: Record<string, unknown>, startTime?: number): void {
    if (!this.enabled('info')) return;
    this.write(console.log, requestId, step, 'INFO', data, startTime);
  }

  debug(requestId: string, step: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    this.write(console.log, requestId, step, 'DEBUG', data);
  }

  success(requestId: string, step: string, data?: Record<string, unknown>, startTime?: number): void {
    if (!this.enabled('info')) return;
    this.write(console.log, requestId, step, 'SUCCESS', data, startTime);
  }

  warn(requestId: string, step: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage(requestId, step, 'WARN'));
    console.warn(`  ${this.colors.yellow}${message}${this.colors.reset}`);
    this.printData(console.warn, data);
  }

  /**
   * Log error with the first stack frames and context
   */
  error(requestId: string, step: string, error: unknown, context?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    console.error(this.formatMessage(requestId, step, 'ERROR'));

    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`  ${this.colors.red}${errorMessage}${this.colors.reset}`);

    if (error instanceof Error && error.stack) {
      error.stack
        .split('\n')
        .slice(1, 4)
        .forEach((line) => console.error(`  ${this.colors.dim}${line.trim()}${this.colors.reset}`));
    }

    if (context) {
      console.error(`  ${this.colors.dim}Context:${this.colors.reset}`);
      this.printData(console.error, context, '    ');
    }
  }

  /**
   * Log performance metrics for a completed scan
   */
  performance(requestId: string, metrics: ScanMetrics): void {
    if (!this.enabled('info')) return;
    const { dim, reset, green, red } = this.colors;
    console.log(this.formatMessage(requestId, 'PERFORMANCE_METRICS', 'INFO'));

    console.log(`  ${dim}Total Duration:${reset} ${green}${metrics.totalDuration}ms${reset}`);
    console.log(`  ${dim}Fetch Duration:${reset} ${metrics.fetchDuration}ms`);
    console.log(`  ${dim}Detection Duration:${reset} ${metrics.detectionDuration}ms`);
    console.log(`  ${dim}HTML Size:${reset} ${this.formatBytes(metrics.htmlSize)}`);
    console.log(`  ${dim}Fetch Backend:${reset} ${metrics.fetchBackend}`);
    console.log(`  ${dim}Auth Found:${reset} ${metrics.authFound ? green + 'Yes' : red + 'No'}${reset}`);

    if (metrics.componentsCount) {
      console.log(`  ${dim}Components Found:${reset} ${metrics.componentsCount}`);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(
    sink: Sink,
    requestId: string,
    step: string,
    tag: Tag,
    data?: Record<string, unknown>,
    startTime?: number
  ): void {
    sink(this.formatMessage(requestId, step, tag));
    this.printData(sink, data);

    if (startTime) {
      const { dim, reset, green } = this.colors;
      sink(`  ${dim}duration:${reset} ${green}${Date.now() - startTime}ms${reset}`);
    }
  }

  private printData(sink: Sink, data?: Record<string, unknown>, indent = '  '): void {
    if (!data) return;
    for (const [key, value] of Object.entries(data)) {
      sink(`${indent}${this.colors.dim}${key}:${this.colors.reset} ${this.formatValue(value)}`);
    }
  }

  private formatMessage(requestId: string, step: string, tag: Tag): string {
    const { dim, reset, bright, red, yellow, green, cyan } = this.colors;
    const timestamp = new Date().toISOString().replace('T', ' ').slice(0, 19);
    const color =
      tag === 'ERROR' ? red : tag === 'WARN' ? yellow : tag === 'SUCCESS' ? green : tag === 'DEBUG' ? dim : cyan;

    return `${dim}[${timestamp}]${reset} ${color}[${requestId}]${reset} ${bright}${step}${reset}`;
  }

  private formatValue(value: unknown): string {
    if (typeof value === 'string') {
      return value.length > 100 ? `${value.slice(0, 100)}...` : value;
    }
    if (typeof value === 'boolean') {
      return value
        ? this.colors.green + 'true' + this.colors.reset
        : this.colors.red + 'false' + this.colors.reset;
    }
    if (Array.isArray(value)) {
      return `[${value.join(', ')}]`;
    }
    if (typeof value === 'object' && value !== null) {
      return JSON.stringify(value, null, 2);
    }
    return String(value);
  }

  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  }
}

export interface ScanMetrics {
  totalDuration: number;
  fetchDuration: number;
  detectionDuration: number;
  htmlSize: number;
  fetchBackend: string;
  authFound: boolean;
  componentsCount?: number;
}

export const logger = new Logger(parseLogLevel(process.env['LOG_LEVEL']));
