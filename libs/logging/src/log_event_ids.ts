import { throwIllegalValue } from '@cardprod/basics';
import { LogEventType } from './base_types/log_event_types';

/**
 * Every event the card production tooling logs.
 */
export enum LogEventId {
  ProcedureStart = 'procedure-start',
  ProcedureComplete = 'procedure-complete',
  ProcedureConfigLoaded = 'procedure-config-loaded',
  ParameterRecordLoaded = 'parameter-record-loaded',
  ParameterRecordGenerated = 'parameter-record-generated',
  ManufacturerCodeWarning = 'manufacturer-code-warning',
  AppletUninstall = 'applet-uninstall',
  AppletInstall = 'applet-install',
  AppletInitialize = 'applet-initialize',
  OperatorPrompt = 'operator-prompt',
  LockKeyChange = 'lock-key-change',
  PinChange = 'pin-change',
  KeyImport = 'key-import',
  KeyImportSkipped = 'key-import-skipped',
  ToolRun = 'tool-run',
}

/**
 * Classifies an event for the `eventType` field of a log line.
 */
export function getEventType(eventId: LogEventId): LogEventType {
  switch (eventId) {
    case LogEventId.ProcedureStart:
    case LogEventId.OperatorPrompt:
      return LogEventType.UserAction;
    case LogEventId.ProcedureComplete:
    case LogEventId.ProcedureConfigLoaded:
    case LogEventId.ManufacturerCodeWarning:
      return LogEventType.SystemStatus;
    case LogEventId.ParameterRecordLoaded:
    case LogEventId.ParameterRecordGenerated:
    case LogEventId.AppletUninstall:
    case LogEventId.AppletInstall:
    case LogEventId.AppletInitialize:
    case LogEventId.LockKeyChange:
    case LogEventId.PinChange:
    case LogEventId.KeyImport:
    case LogEventId.KeyImportSkipped:
      return LogEventType.SystemAction;
    case LogEventId.ToolRun:
      return LogEventType.ToolInvocation;
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(eventId);
  }
}
