/* eslint-disable no-console */
import makeDebug, { Debugger } from 'debug';
import { format } from 'util';
import { LogSource } from './base_types/log_source';
import { LogEventId, getEventType } from './log_event_ids';
import { LogData, LogLine, LoggingUserRole } from './types';

export interface LoggerOptions {
  /**
   * Enables the `debug` channel for this logger only.
   */
  verbose?: boolean;

  /**
   * Receives each formatted debug line. Defaults to `debug`'s own output
   * (stderr).
   */
  debugOutput?: (line: string) => void;
}

/**
 * Writes structured log lines, one JSON object per line, to stdout. Each
 * component gets its own instance; nothing here is process-wide.
 */
export class Logger {
  private readonly debugger: Debugger;

  constructor(
    private readonly source: LogSource,
    private readonly options: LoggerOptions = {}
  ) {
    this.debugger = makeDebug(`card-production:${source}`);
    this.debugger.enabled = options.verbose ?? false;
    const { debugOutput } = options;
    if (debugOutput) {
      this.debugger.log = (...args: unknown[]) => debugOutput(format(...args));
    }
  }

  getSource(): LogSource {
    return this.source;
  }

  isVerbose(): boolean {
    return this.options.verbose ?? false;
  }

  /**
   * Returns a logger sharing this logger's settings under another source.
   */
  withSource(source: LogSource): Logger {
    return new Logger(source, this.options);
  }

  async log(
    eventId: LogEventId,
    user: LoggingUserRole,
    logData: LogData = {}
  ): Promise<void> {
    const { message, disposition, ...additionalData } = logData;
    const logLine: LogLine = {
      source: this.source,
      eventId,
      eventType: getEventType(eventId),
      user,
      message,
      disposition,
      ...additionalData,
    };
    console.log(JSON.stringify(logLine));
  }

  /**
   * Verbose-only diagnostics, formatted the way `debug` formats them.
   */
  debug(formatter: string, ...args: unknown[]): void {
    this.debugger(formatter, ...args);
  }
}
