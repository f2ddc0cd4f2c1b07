import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { dirSync } from 'tmp';
import { commandResult, mockCommandRunner } from '../../test/fake_runner';
import { ToolkitSettings } from '../toolkit';
import { main } from './main';

let directory: string;
let settings: ToolkitSettings;

beforeEach(() => {
  console.log = jest.fn();
  console.error = jest.fn();
  directory = dirSync({ unsafeCleanup: true }).name;
  settings = {
    gpCommand: ['java', '-jar', 'gp.jar'],
    gidsToolCommand: ['gids-tool'],
    pkcs15InitCommand: ['pkcs15-init'],
    pkcs15ToolCommand: ['pkcs15-tool'],
    openPgpToolCommand: ['openpgp-tool'],
    openScExplorerCommand: ['opensc-explorer'],
    gidsCapFile: join(directory, 'GidsApplet.cap'),
    smartPgpCapFile: join(directory, 'SmartPGP.cap'),
  };
});

async function writeProcedure(name: string, text: string): Promise<string> {
  const path = join(directory, name);
  await writeFile(path, text);
  return path;
}

test('prints help without arguments', async () => {
  expect(await main([])).toEqual(0);
  expect(console.log).toHaveBeenCalledWith(
    expect.stringContaining('produce-smartpgp <procedure-file>')
  );
});

test('rejects an unknown command', async () => {
  expect(await main(['produce-piv', 'procedure.toml'])).toEqual(1);
  expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^❌ /));
});

test('requires a procedure file', async () => {
  expect(await main(['produce-gids'])).toEqual(1);
  expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^❌ /));
});

test('generate-parameters writes the parameter files', async () => {
  const procedure = await writeProcedure(
    'procedure.toml',
    [
      'gids_parameters_filename = "gids.toml"',
      '[gp_config]',
      'desired_parameters_filename = "gp.toml"',
    ].join('\n')
  );

  expect(await main(['generate-parameters', procedure], { settings })).toEqual(
    0
  );
  expect(existsSync(join(directory, 'gids.toml'))).toEqual(true);
  expect(existsSync(join(directory, 'gp.toml'))).toEqual(true);
  expect(console.error).not.toHaveBeenCalled();
});

test('a procedure of the wrong family fails', async () => {
  const procedure = await writeProcedure(
    'procedure.toml',
    'openpgp_install_parameters_filename = "pgp.toml"\n'
  );

  expect(await main(['produce-gids', procedure], { settings })).toEqual(1);
  expect(console.error).toHaveBeenCalledWith(
    `❌ Expected a gids procedure in procedure file ${procedure}, found a smartpgp procedure`
  );
  expect(existsSync(join(directory, 'pgp.toml'))).toEqual(false);
});

test('a missing cap file fails before touching the card', async () => {
  const runner = mockCommandRunner();
  const procedure = await writeProcedure(
    'procedure.toml',
    'gids_parameters_filename = "gids.toml"\ninstall_and_init_gids = true\n'
  );

  expect(
    await main(['produce-gids', procedure], { settings, runner })
  ).toEqual(1);
  expect(console.error).toHaveBeenCalledWith(
    `❌ Could not find GidsApplet cap file ${settings.gidsCapFile}`
  );
  expect(runner).not.toHaveBeenCalled();
});

test('produce-smartpgp runs the tools in order', async () => {
  await writeFile(settings.smartPgpCapFile, 'cap');
  const runner = mockCommandRunner();
  runner.mockImplementation(async ([tool]) =>
    commandResult({
      stdout:
        tool === 'opensc-explorer'
          ? 'Received (SW1=0x90, SW2=0x00)\n'.repeat(3)
          : '',
    })
  );
  const writePrompt = jest.fn();
  const procedure = await writeProcedure(
    'procedure.toml',
    [
      'openpgp_install_parameters_filename = "pgp.toml"',
      'install_smartpgp = true',
      '[pin_config]',
      'desired_pins_filename = "pins.toml"',
    ].join('\n')
  );

  expect(
    await main(['produce-smartpgp', '-v', procedure], {
      settings,
      runner,
      writePrompt,
    })
  ).toEqual(0);
  expect(runner.mock.calls.map(([command]) => command[0])).toEqual([
    'java',
    'java',
    'openpgp-tool',
    'opensc-explorer',
  ]);
  expect(runner.mock.calls[2]?.[0]).toEqual([
    'openpgp-tool',
    '--card-info',
    '--verbose',
    '--wait',
  ]);
  expect(writePrompt).toHaveBeenCalledTimes(1);
  expect(console.error).not.toHaveBeenCalled();
});

test('a tool failure fails the run', async () => {
  await writeFile(settings.gidsCapFile, 'cap');
  await writeFile(join(directory, 'signer.p12'), 'not really pkcs12');
  const runner = mockCommandRunner();
  runner.mockResolvedValueOnce({
    exitCode: 1,
    stdout: '',
    stderr: 'No smart card readers found.\n',
  });
  const procedure = await writeProcedure(
    'procedure.toml',
    [
      'gids_parameters_filename = "gids.toml"',
      '[[key_loading]]',
      'label = "signer"',
      '[key_loading.key]',
      'filename = "signer.p12"',
    ].join('\n')
  );

  expect(
    await main(['produce-gids', procedure], { settings, runner })
  ).toEqual(1);
  expect(console.error).toHaveBeenCalledWith(
    '❌ pkcs15-tool failed with exit code 1: No smart card readers found.'
  );
  expect(runner).toHaveBeenCalledTimes(1);
});
