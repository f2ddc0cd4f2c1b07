/**
 * The dispositions most log events use. Events may use other strings.
 */
export enum LogDispositionStandardTypes {
  Success = 'success',
  Failure = 'failure',
  NotApplicable = 'na',
}

export type LoggingUserRole = 'operator' | 'system';

export interface LogData {
  message?: string;
  disposition?: LogDispositionStandardTypes | string;
  [key: string]: unknown;
}

export interface LogLine extends LogData {
  source: string;
  eventId: string;
  eventType: string;
  user: LoggingUserRole;
}
