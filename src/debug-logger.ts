/**
 * Debug logging for the normalization pipeline and the unifier.
 * Controlled by environment variables:
 * - DEBUG_CLAUSAL=true to enable debug logging
 * - DEBUG_CLAUSAL_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_CLAUSAL_FILTER=CNF,UNIFY,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  NNF = 'NNF',
  SKOLEM = 'SKOLEM',
  DISTRIBUTE = 'DISTRIBUTE',
  CNF = 'CNF',
  UNIFY = 'UNIFY',
}

export type LogSink = (line: string) => void;

const isLogLevel = (s: string): s is keyof typeof LogLevel =>
  s === 'TRACE' || s === 'DEBUG' || s === 'INFO';

export class DebugLogger {
  private enabled: boolean;
  private level: LogLevel;
  private componentFilter: Set<string> | null;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly sink: LogSink = console.log
  ) {
    this.enabled = env.DEBUG_CLAUSAL === 'true';

    // Parse log level
    const levelStr = (env.DEBUG_CLAUSAL_LEVEL || 'DEBUG').toUpperCase();
    this.level = isLogLevel(levelStr) ? LogLevel[levelStr] : LogLevel.DEBUG;

    // Parse component filter
    const filterStr = env.DEBUG_CLAUSAL_FILTER;
    if (filterStr) {
      this.componentFilter = new Set(
        filterStr.split(',').map((s) => s.trim().toUpperCase())
      );
    } else {
      this.componentFilter = null; // null means log all components
    }
  }

  shouldLog(level: LogLevel, component: LogComponent): boolean {
    if (!this.enabled) return false;
    if (level < this.level) return false;
    if (this.componentFilter && !this.componentFilter.has(component))
      return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  // Renders the clause only when the message will actually be written
  logClause(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    renderFn: () => string
  ): void {
    if (!this.shouldLog(level, component)) return;
    this.log(level, component, `${prefix}: ${renderFn()}`);
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.shouldLog(level, component)) {
      this.sink(this.formatMessage(level, component, message));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();
