import { throwIllegalValue } from '@cardprod/basics';
import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import { ProcedureConfig } from '../config/procedure_config';
import { ParameterStore } from '../parameter_store';
import { GidsAppletParametersRecord } from '../params/gids_parameters';
import { GpParametersRecord } from '../params/gp_parameters';
import {
  OpenPgpPinsRecord,
  openPgpInstallParametersRecord,
} from '../params/openpgp_parameters';

/**
 * Loads, or generates and saves, every record a procedure can generate: the
 * desired lock key, the applet parameters and the desired PINs. Current values
 * are left alone. No card is needed, so secrets can be prepared and backed up
 * ahead of production.
 *
 * Resolves to the paths of the records, in the order above.
 */
export async function generateParameters({
  config,
  store,
  logger,
}: {
  config: ProcedureConfig;
  store: ParameterStore;
  logger: Logger;
}): Promise<string[]> {
  const paths: string[] = [];

  const { desiredParametersFilename } = config.gpConfig;
  if (desiredParametersFilename !== undefined) {
    await store.loadOrGenerate(desiredParametersFilename, GpParametersRecord);
    paths.push(desiredParametersFilename);
  }

  switch (config.family) {
    case 'gids':
      await store.loadOrGenerate(
        config.gidsParametersFilename,
        GidsAppletParametersRecord
      );
      paths.push(config.gidsParametersFilename);
      break;
    case 'smartpgp': {
      await store.loadOrGenerate(
        config.openPgpInstallParametersFilename,
        openPgpInstallParametersRecord(config.manufacturerCode)
      );
      paths.push(config.openPgpInstallParametersFilename);

      const { desiredPinsFilename } = config.pinConfig;
      if (desiredPinsFilename !== undefined) {
        await store.loadOrGenerate(desiredPinsFilename, OpenPgpPinsRecord);
        paths.push(desiredPinsFilename);
      }
      break;
    }
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(config);
  }

  await logger.log(LogEventId.ProcedureComplete, 'operator', {
    message: `Parameters ready for the ${config.family} procedure`,
    disposition: LogDispositionStandardTypes.Success,
    paths,
  });
  return paths;
}
