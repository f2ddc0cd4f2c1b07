import { throwIllegalValue } from '@cardprod/basics';
import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import {
  PinConfig,
  SmartPgpProcedureConfig,
} from '../config/procedure_config';
import { ParameterStore } from '../parameter_store';
import {
  OpenPgpPins,
  OpenPgpPinsRecord,
  openPgpInstallParametersRecord,
} from '../params/openpgp_parameters';
import { PinChanger, SmartPgpToolkit } from '../tools/types';
import {
  installApplet,
  reconcileLockKey,
  resolveGpParameters,
} from './card_manager';
import { ReconcileOutcome, planReconcile, reconcileOutcome } from './reconcile';

export interface SmartPgpProcedureSummary {
  readonly family: 'smartpgp';
  readonly installed: boolean;
  readonly applicationIdentifier: string;
  readonly lockKey: ReconcileOutcome;
  readonly pins: ReconcileOutcome;
}

async function resolvePins(
  store: ParameterStore,
  pinConfig: PinConfig
): Promise<{ desired?: OpenPgpPins; current?: OpenPgpPins }> {
  const desired =
    pinConfig.desiredPinsFilename === undefined
      ? undefined
      : await store.loadOrGenerate(
          pinConfig.desiredPinsFilename,
          OpenPgpPinsRecord
        );
  const current =
    pinConfig.currentPinsFilename === undefined
      ? undefined
      : await store.loadRequired(
          pinConfig.currentPinsFilename,
          OpenPgpPinsRecord
        );
  return { desired, current };
}

async function reconcilePins({
  pinChanger,
  pins,
  logger,
}: {
  pinChanger: PinChanger;
  pins: { desired?: OpenPgpPins; current?: OpenPgpPins };
  logger: Logger;
}): Promise<ReconcileOutcome> {
  const plan = planReconcile(pins);
  switch (plan.type) {
    case 'keep':
      logger.debug('PINs already as desired');
      break;
    case 'restore-default':
      await pinChanger.changePins({
        desired: OpenPgpPins.factoryDefault(),
        current: plan.current,
      });
      await logger.log(LogEventId.PinChange, 'system', {
        message: 'Restored the factory default OpenPGP PINs',
        disposition: LogDispositionStandardTypes.Success,
      });
      break;
    case 'change':
      await pinChanger.changePins({
        desired: plan.desired,
        current: plan.current,
      });
      await logger.log(LogEventId.PinChange, 'system', {
        message: 'Changed the OpenPGP PINs',
        disposition: LogDispositionStandardTypes.Success,
      });
      break;
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(plan);
  }
  return reconcileOutcome(plan);
}

/**
 * Produces one SmartPGP card: optionally (re)installs the applet under its
 * serial number, then reconciles the lock key and the PINs. All parameters are
 * resolved before the card is touched.
 */
export async function produceSmartPgp({
  config,
  store,
  toolkit,
  logger,
}: {
  config: SmartPgpProcedureConfig;
  store: ParameterStore;
  toolkit: SmartPgpToolkit;
  logger: Logger;
}): Promise<SmartPgpProcedureSummary> {
  await logger.log(LogEventId.ProcedureStart, 'operator', {
    message: 'Starting SmartPGP card production',
    family: config.family,
  });

  const gpParams = await resolveGpParameters(store, config.gpConfig);
  const installParams = await store.loadOrGenerate(
    config.openPgpInstallParametersFilename,
    openPgpInstallParametersRecord(config.manufacturerCode)
  );
  if (!installParams.isRandomAssignment()) {
    await logger.log(LogEventId.ManufacturerCodeWarning, 'system', {
      message: `Manufacturer code ${installParams.manufacturerCode} is not in the range for randomly assigned serial numbers and must be registered`,
      disposition: LogDispositionStandardTypes.NotApplicable,
      manufacturerCode: installParams.manufacturerCode,
    });
  }
  const pins = await resolvePins(store, config.pinConfig);
  const applicationIdentifier = installParams.applicationIdentifier();

  if (config.installSmartPgp) {
    await installApplet({
      appletName: 'SmartPGP',
      capFile: toolkit.capFile,
      gp: toolkit.gp,
      auth: gpParams.current,
      instanceAid: applicationIdentifier,
      promptReinsert: toolkit.promptReinsert,
      initialize: () => toolkit.openPgp.initialize({ wait: true }),
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
  const pinOutcome = await reconcilePins({
    pinChanger: toolkit.pinChanger,
    pins,
    logger,
  });

  const summary: SmartPgpProcedureSummary = {
    family: 'smartpgp',
    installed: config.installSmartPgp,
    applicationIdentifier,
    lockKey,
    pins: pinOutcome,
  };
  await logger.log(LogEventId.ProcedureComplete, 'system', {
    message: 'SmartPGP card production complete',
    disposition: LogDispositionStandardTypes.Success,
    ...summary,
  });
  return summary;
}
