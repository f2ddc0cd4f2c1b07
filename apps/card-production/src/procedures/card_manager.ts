import { throwIllegalValue } from '@cardprod/basics';
import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import { GpConfig } from '../config/procedure_config';
import { ParameterStore } from '../parameter_store';
import { GpParameters, GpParametersRecord } from '../params/gp_parameters';
import { GlobalPlatformManager, ReinsertPrompt } from '../tools/types';
import { ReconcileOutcome, planReconcile, reconcileOutcome } from './reconcile';

export interface ResolvedGpParameters {
  /** Unset means the card should end up with the factory default key. */
  readonly desired?: GpParameters;
  /** Unset means the card has the factory default key. */
  readonly current?: GpParameters;
}

/**
 * Loads the lock keys named by `gpConfig`. A desired key is generated if its
 * file doesn't exist yet; a current key has to be on file.
 */
export async function resolveGpParameters(
  store: ParameterStore,
  gpConfig: GpConfig
): Promise<ResolvedGpParameters> {
  const desired =
    gpConfig.desiredParametersFilename === undefined
      ? undefined
      : await store.loadOrGenerate(
          gpConfig.desiredParametersFilename,
          GpParametersRecord
        );
  const current =
    gpConfig.currentParametersFilename === undefined
      ? undefined
      : await store.loadRequired(
          gpConfig.currentParametersFilename,
          GpParametersRecord
        );
  return { desired, current };
}

/**
 * Removes any previous instance of the applet, installs it fresh, and has the
 * operator reinsert the card before `initialize` runs.
 */
export async function installApplet({
  appletName,
  capFile,
  gp,
  auth,
  instanceAid,
  promptReinsert,
  initialize,
  logger,
}: {
  appletName: string;
  capFile: string;
  gp: GlobalPlatformManager;
  auth?: GpParameters;
  instanceAid?: string;
  promptReinsert: ReinsertPrompt;
  initialize: () => Promise<void>;
  logger: Logger;
}): Promise<void> {
  const authParams = auth ?? GpParameters.factoryDefault();

  logger.debug('uninstalling %s in case it is already installed', appletName);
  if (await gp.uninstall(capFile, { auth: authParams })) {
    await logger.log(LogEventId.AppletUninstall, 'system', {
      message: `Uninstalled the previous ${appletName}`,
      disposition: LogDispositionStandardTypes.Success,
      capFile,
    });
  }

  await gp.install(capFile, { auth: authParams, instanceAid });
  await logger.log(LogEventId.AppletInstall, 'system', {
    message: `Installed ${appletName} from ${capFile}`,
    disposition: LogDispositionStandardTypes.Success,
    capFile,
    instanceAid,
  });

  await promptReinsert();
  await initialize();
  await logger.log(LogEventId.AppletInitialize, 'system', {
    message: `Initialized ${appletName}`,
    disposition: LogDispositionStandardTypes.Success,
  });
}

/**
 * Brings the card's lock key in line with the desired one, restoring the
 * factory default key if none is desired.
 */
export async function reconcileLockKey({
  gp,
  params,
  logger,
}: {
  gp: GlobalPlatformManager;
  params: ResolvedGpParameters;
  logger: Logger;
}): Promise<ReconcileOutcome> {
  const plan = planReconcile(params);
  switch (plan.type) {
    case 'keep':
      logger.debug('lock key already as desired');
      break;
    case 'restore-default':
      await gp.lockCard({
        newParams: GpParameters.factoryDefault(),
        currentParams: plan.current,
      });
      await logger.log(LogEventId.LockKeyChange, 'system', {
        message: 'Restored the factory default GlobalPlatform lock key',
        disposition: LogDispositionStandardTypes.Success,
      });
      break;
    case 'change':
      await gp.lockCard({
        newParams: plan.desired,
        currentParams: plan.current,
      });
      await logger.log(LogEventId.LockKeyChange, 'system', {
        message: 'Changed the GlobalPlatform lock key',
        disposition: LogDispositionStandardTypes.Success,
      });
      break;
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(plan);
  }
  return reconcileOutcome(plan);
}
