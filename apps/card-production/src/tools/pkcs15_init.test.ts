import {
  commandResult,
  makeToolContext,
  mockCommandRunner,
} from '../../test/fake_runner';
import { ToolExecutionError } from '../errors';
import { GidsAppletParameters } from '../params/gids_parameters';
import { Pkcs15Init } from './pkcs15_init';

const params = new GidsAppletParameters({
  admin_key: '000102030405060708090A0B0C0D0E0F1011121314151617',
  sn: '00112233445566778899AABBCCDDEEFF',
  pin: '135790',
});

beforeEach(() => {
  console.log = jest.fn();
});

test('importKey with a passphrase', async () => {
  const context = makeToolContext({ command: ['pkcs15-init'], verbose: true });
  await new Pkcs15Init(context).importKey(params, {
    label: 'signer',
    key: { filename: '/keys/signer.p12', passphrase: 'test-passphrase' },
  });

  expect(context.runner).toHaveBeenCalledWith(
    [
      'pkcs15-init',
      '--verbose',
      '--verify-pin',
      '--auth-id',
      '80',
      '--pin',
      '135790',
      '--store-private-key',
      '/keys/signer.p12',
      '--format',
      'pkcs12',
      '--passphrase',
      'test-passphrase',
      '--label',
      'signer',
    ],
    {}
  );
});

test('importKey without a passphrase', async () => {
  const context = makeToolContext({ command: ['pkcs15-init'] });
  await new Pkcs15Init(context).importKey(params, {
    label: 'auth',
    key: { filename: '/keys/auth.p12' },
  });

  expect(context.runner).toHaveBeenCalledWith(
    [
      'pkcs15-init',
      '--verify-pin',
      '--auth-id',
      '80',
      '--pin',
      '135790',
      '--store-private-key',
      '/keys/auth.p12',
      '--format',
      'pkcs12',
      '--label',
      'auth',
    ],
    {}
  );
});

test('importKey fails on a non-zero exit code', async () => {
  const runner = mockCommandRunner();
  runner.mockResolvedValueOnce(commandResult({ exitCode: 1 }));
  const importer = new Pkcs15Init(
    makeToolContext({ command: ['pkcs15-init'], runner })
  );

  await expect(
    importer.importKey(params, {
      label: 'auth',
      key: { filename: '/keys/auth.p12' },
    })
  ).rejects.toThrow(ToolExecutionError);
});
