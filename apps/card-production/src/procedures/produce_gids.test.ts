import { LogSource, Logger } from '@cardprod/logging';
import { existsSync } from 'fs';
import { join } from 'path';
import { dirSync } from 'tmp';
import { fakeGidsToolkit } from '../../test/fake_tools';
import { GidsProcedureConfig } from '../config/procedure_config';
import { ConfigError, ToolExecutionError } from '../errors';
import { ParameterStore } from '../parameter_store';
import { GidsAppletParametersRecord } from '../params/gids_parameters';
import { GpParameters, GpParametersRecord } from '../params/gp_parameters';
import { produceGids } from './produce_gids';

let workspace: string;
let store: ParameterStore;
let logger: Logger;

beforeEach(() => {
  console.log = jest.fn();
  workspace = dirSync({ unsafeCleanup: true }).name;
  logger = new Logger(LogSource.GidsProcedure);
  store = new ParameterStore({ logger });
});

function gidsConfig(
  overrides: Partial<GidsProcedureConfig> = {}
): GidsProcedureConfig {
  return {
    family: 'gids',
    gidsParametersFilename: join(workspace, 'gids.toml'),
    installAndInitGids: false,
    gpConfig: {},
    keyLoading: [],
    ...overrides,
  };
}

test('installs, initializes and imports a key on a factory fresh card', async () => {
  const toolkit = fakeGidsToolkit();
  const config = gidsConfig({
    installAndInitGids: true,
    keyLoading: [
      { label: 'signer', key: { filename: join(workspace, 'signer.p12') } },
    ],
  });

  const summary = await produceGids({ config, store, toolkit, logger });

  expect(summary).toEqual({
    family: 'gids',
    installed: true,
    lockKey: 'unchanged',
    importedLabels: ['signer'],
    skippedLabels: [],
  });
  expect(toolkit.events).toEqual([
    'uninstall',
    'install',
    'promptReinsert',
    'initialize',
    'enumerateCertificates',
    'importKey signer',
  ]);
  expect(toolkit.gp.lockCard).not.toHaveBeenCalled();
  expect(toolkit.keyImporter.importKey).toHaveBeenCalledTimes(1);

  const gidsParams = await store.loadRequired(
    config.gidsParametersFilename,
    GidsAppletParametersRecord
  );
  expect(toolkit.gp.install).toHaveBeenCalledWith('/applets/GidsApplet.cap', {
    auth: GpParameters.factoryDefault(),
    instanceAid: undefined,
  });
  expect(toolkit.gids.initialize.mock.calls[0]?.[0].equals(gidsParams)).toEqual(
    true
  );
  expect(toolkit.gids.initialize.mock.calls[0]?.[1]).toEqual({ wait: true });
});

test('does nothing to the card when nothing is requested', async () => {
  const toolkit = fakeGidsToolkit();
  const config = gidsConfig();

  const summary = await produceGids({ config, store, toolkit, logger });

  expect(summary).toEqual({
    family: 'gids',
    installed: false,
    lockKey: 'unchanged',
    importedLabels: [],
    skippedLabels: [],
  });
  expect(toolkit.events).toEqual([]);
  expect(existsSync(config.gidsParametersFilename)).toEqual(true);
});

test('locks a card with the factory default key to a new key', async () => {
  const toolkit = fakeGidsToolkit();
  const desiredPath = join(workspace, 'gp-new.toml');
  const config = gidsConfig({
    gpConfig: { desiredParametersFilename: desiredPath },
  });

  const summary = await produceGids({ config, store, toolkit, logger });

  const desired = await store.loadRequired(desiredPath, GpParametersRecord);
  expect(summary.lockKey).toEqual('changed');
  expect(toolkit.gp.lockCard).toHaveBeenCalledTimes(1);
  expect(toolkit.gp.lockCard).toHaveBeenCalledWith({
    newParams: desired,
    currentParams: undefined,
  });
});

test('restores the factory default key when no key is desired', async () => {
  const toolkit = fakeGidsToolkit();
  const currentPath = join(workspace, 'gp-old.toml');
  const current = GpParameters.generate();
  await store.save(currentPath, current);

  const summary = await produceGids({
    config: gidsConfig({
      installAndInitGids: true,
      gpConfig: { currentParametersFilename: currentPath },
    }),
    store,
    toolkit,
    logger,
  });

  expect(summary.lockKey).toEqual('restored-default');
  expect(toolkit.gp.uninstall).toHaveBeenCalledWith('/applets/GidsApplet.cap', {
    auth: current,
  });
  expect(toolkit.gp.lockCard).toHaveBeenCalledWith({
    newParams: GpParameters.factoryDefault(),
    currentParams: current,
  });
});

test('leaves the lock key alone when it is already the desired one', async () => {
  const toolkit = fakeGidsToolkit();
  const key = GpParameters.generate();
  const currentPath = join(workspace, 'gp-old.toml');
  const desiredPath = join(workspace, 'gp-new.toml');
  await store.save(currentPath, key);
  await store.save(desiredPath, key);

  const summary = await produceGids({
    config: gidsConfig({
      gpConfig: {
        currentParametersFilename: currentPath,
        desiredParametersFilename: desiredPath,
      },
    }),
    store,
    toolkit,
    logger,
  });

  expect(summary.lockKey).toEqual('unchanged');
  expect(toolkit.gp.lockCard).not.toHaveBeenCalled();
});

test('changes the lock key from the current key to the desired one', async () => {
  const toolkit = fakeGidsToolkit();
  const current = GpParameters.generate();
  const desired = GpParameters.generate();
  const currentPath = join(workspace, 'gp-old.toml');
  const desiredPath = join(workspace, 'gp-new.toml');
  await store.save(currentPath, current);
  await store.save(desiredPath, desired);

  await produceGids({
    config: gidsConfig({
      gpConfig: {
        currentParametersFilename: currentPath,
        desiredParametersFilename: desiredPath,
      },
    }),
    store,
    toolkit,
    logger,
  });

  expect(toolkit.gp.lockCard).toHaveBeenCalledWith({
    newParams: desired,
    currentParams: current,
  });
});

test('requires the current key to be on file before touching the card', async () => {
  const toolkit = fakeGidsToolkit();
  const config = gidsConfig({
    installAndInitGids: true,
    gpConfig: { currentParametersFilename: join(workspace, 'missing.toml') },
  });

  await expect(
    produceGids({ config, store, toolkit, logger })
  ).rejects.toThrow(ConfigError);
  expect(toolkit.events).toEqual([]);
  expect(existsSync(join(workspace, 'missing.toml'))).toEqual(false);
});

test('skips keys whose labels are already on the card', async () => {
  const toolkit = fakeGidsToolkit({ labelsOnCard: ['signer'] });
  const config = gidsConfig({
    keyLoading: [
      { label: 'signer', key: { filename: '/keys/signer.p12' } },
      { label: 'auth', key: { filename: '/keys/auth.p12' } },
      { label: 'auth', key: { filename: '/keys/auth-again.p12' } },
    ],
  });

  const summary = await produceGids({ config, store, toolkit, logger });

  expect(summary.importedLabels).toEqual(['auth']);
  expect(summary.skippedLabels).toEqual(['signer', 'auth']);
  expect(toolkit.events).toEqual(['enumerateCertificates', 'importKey auth']);
  expect(toolkit.keyImporter.importKey.mock.calls[0]?.[1]).toEqual({
    label: 'auth',
    key: { filename: '/keys/auth.p12' },
  });
});

test('stops at the first tool failure', async () => {
  const toolkit = fakeGidsToolkit();
  toolkit.gp.install.mockRejectedValueOnce(new ToolExecutionError('gp', 1));
  const config = gidsConfig({
    installAndInitGids: true,
    gpConfig: { desiredParametersFilename: join(workspace, 'gp-new.toml') },
    keyLoading: [{ label: 'signer', key: { filename: '/keys/signer.p12' } }],
  });

  await expect(
    produceGids({ config, store, toolkit, logger })
  ).rejects.toThrow('gp failed with exit code 1');
  expect(toolkit.events).toEqual(['uninstall']);
  expect(toolkit.gp.lockCard).not.toHaveBeenCalled();
  expect(toolkit.keyImporter.importKey).not.toHaveBeenCalled();
});
