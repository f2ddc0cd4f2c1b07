import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import {
  GidsProcedureConfig,
  KeyLoadingRequest,
} from '../config/procedure_config';
import { ParameterStore } from '../parameter_store';
import {
  GidsAppletParameters,
  GidsAppletParametersRecord,
} from '../params/gids_parameters';
import { GidsToolkit } from '../tools/types';
import {
  installApplet,
  reconcileLockKey,
  resolveGpParameters,
} from './card_manager';
import { ReconcileOutcome } from './reconcile';

export interface GidsProcedureSummary {
  readonly family: 'gids';
  readonly installed: boolean;
  readonly lockKey: ReconcileOutcome;
  readonly importedLabels: string[];
  readonly skippedLabels: string[];
}

async function loadKeys({
  requests,
  params,
  toolkit,
  logger,
}: {
  requests: readonly KeyLoadingRequest[];
  params: GidsAppletParameters;
  toolkit: GidsToolkit;
  logger: Logger;
}): Promise<{ importedLabels: string[]; skippedLabels: string[] }> {
  const importedLabels: string[] = [];
  const skippedLabels: string[] = [];
  if (requests.length === 0) {
    return { importedLabels, skippedLabels };
  }

  const presentLabels = new Set(
    await toolkit.certificates.enumerateCertificates()
  );
  logger.debug('labels on card: %o', [...presentLabels]);

  for (const request of requests) {
    if (presentLabels.has(request.label)) {
      skippedLabels.push(request.label);
      await logger.log(LogEventId.KeyImportSkipped, 'system', {
        message: `A certificate labeled '${request.label}' is already on the card; not importing ${request.key.filename}`,
        disposition: LogDispositionStandardTypes.NotApplicable,
        label: request.label,
      });
      continue;
    }

    await toolkit.keyImporter.importKey(params, request);
    presentLabels.add(request.label);
    importedLabels.push(request.label);
    await logger.log(LogEventId.KeyImport, 'system', {
      message: `Imported ${request.key.filename} as '${request.label}'`,
      disposition: LogDispositionStandardTypes.Success,
      label: request.label,
    });
  }
  return { importedLabels, skippedLabels };
}

/**
 * Produces one GIDS card: optionally (re)installs and initializes the applet,
 * reconciles the lock key, then imports any keys the card doesn't have yet.
 * All parameters are resolved before the card is touched.
 */
export async function produceGids({
  config,
  store,
  toolkit,
  logger,
}: {
  config: GidsProcedureConfig;
  store: ParameterStore;
  toolkit: GidsToolkit;
  logger: Logger;
}): Promise<GidsProcedureSummary> {
  await logger.log(LogEventId.ProcedureStart, 'operator', {
    message: 'Starting GIDS card production',
    family: config.family,
  });

  const gpParams = await resolveGpParameters(store, config.gpConfig);
  const gidsParams = await store.loadOrGenerate(
    config.gidsParametersFilename,
    GidsAppletParametersRecord
  );

  if (config.installAndInitGids) {
    await installApplet({
      appletName: 'GidsApplet',
      capFile: toolkit.capFile,
      gp: toolkit.gp,
      auth: gpParams.current,
      promptReinsert: toolkit.promptReinsert,
      initialize: () => toolkit.gids.initialize(gidsParams, { wait: true }),
      logger,
    });
  } else {
    logger.debug('skipping applet uninstall and reinstall');
  }

  const lockKey = await reconcileLockKey({
    gp: toolkit.gp,
    params: gpParams,
    logger,
  });

  const { importedLabels, skippedLabels } = await loadKeys({
    requests: config.keyLoading,
    params: gidsParams,
    toolkit,
    logger,
  });

  const summary: GidsProcedureSummary = {
    family: 'gids',
    installed: config.installAndInitGids,
    lockKey,
    importedLabels,
    skippedLabels,
  };
  await logger.log(LogEventId.ProcedureComplete, 'system', {
    message: 'GIDS card production complete',
    disposition: LogDispositionStandardTypes.Success,
    ...summary,
  });
  return summary;
}
