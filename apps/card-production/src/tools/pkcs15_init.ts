import { KeyLoadingRequest } from '../config/procedure_config';
import { GidsAppletParameters } from '../params/gids_parameters';
import { NativeTool, ToolContext } from './native_tool';
import { KeyImporter } from './types';

/**
 * PIN reference of the GIDS user PIN.
 */
const GIDS_USER_PIN_AUTH_ID = '80';

/**
 * OpenSC's `pkcs15-init`, used to store a PKCS#12 key and certificate.
 */
export class Pkcs15Init extends NativeTool implements KeyImporter {
  constructor(context: ToolContext) {
    super('pkcs15-init', context);
  }

  async importKey(
    params: GidsAppletParameters,
    { label, key }: KeyLoadingRequest
  ): Promise<void> {
    params.validate();
    await this.runChecked([
      ...this.verboseArgs(),
      '--verify-pin',
      '--auth-id',
      GIDS_USER_PIN_AUTH_ID,
      '--pin',
      params.pin,
      '--store-private-key',
      key.filename,
      '--format',
      'pkcs12',
      ...(key.passphrase === undefined ? [] : ['--passphrase', key.passphrase]),
      '--label',
      label,
    ]);
  }
}
