import {
  commandResult,
  makeToolContext,
  mockCommandRunner,
} from '../../test/fake_runner';
import { GidsAppletParameters } from '../params/gids_parameters';
import { GidsTool } from './gids_tool';

const params = new GidsAppletParameters({
  admin_key: '000102030405060708090a0b0c0d0e0f1011121314151617',
  sn: '00112233445566778899aabbccddeeff',
  pin: '246810',
});

beforeEach(() => {
  console.log = jest.fn();
});

test('initialize', async () => {
  const context = makeToolContext({ command: ['gids-tool'] });
  await new GidsTool(context).initialize(params, { wait: false });

  expect(context.runner).toHaveBeenCalledWith(
    [
      'gids-tool',
      '--initialize',
      '--admin-key',
      '000102030405060708090A0B0C0D0E0F1011121314151617',
      '--pin',
      '246810',
      '--serial-number',
      '00112233445566778899AABBCCDDEEFF',
    ],
    {}
  );
});

test('initialize waiting for the card, verbosely', async () => {
  const context = makeToolContext({
    command: ['/opt/opensc/bin/gids-tool'],
    verbose: true,
  });
  await new GidsTool(context).initialize(params, { wait: true });

  expect(context.runner.mock.calls[0]?.[0].slice(0, 4)).toEqual([
    '/opt/opensc/bin/gids-tool',
    '--verbose',
    '--wait',
    '--initialize',
  ]);
});

test('initialize fails on a non-zero exit code', async () => {
  const runner = mockCommandRunner();
  runner.mockResolvedValueOnce(
    commandResult({ exitCode: 1, stderr: 'Card is already initialized\n' })
  );
  const tool = new GidsTool(makeToolContext({ command: ['gids-tool'], runner }));

  await expect(tool.initialize(params, { wait: true })).rejects.toThrow(
    'gids-tool failed with exit code 1: Card is already initialized'
  );
});
