/**
 * Broad categories of log events.
 */
export enum LogEventType {
  /**
   * Something the operator asked for or must do.
   */
  UserAction = 'user-action',

  /**
   * Something the system did on its own while carrying out a procedure.
   */
  SystemAction = 'system-action',

  /**
   * A report on the state of the system or the card.
   */
  SystemStatus = 'system-status',

  /**
   * A native tool was run.
   */
  ToolInvocation = 'tool-invocation',
}
