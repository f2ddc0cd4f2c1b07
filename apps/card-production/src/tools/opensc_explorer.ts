import { Buffer } from 'buffer';
import {
  OpenPgpPins,
  DEFAULT_OPENPGP_ADMIN_PIN,
  DEFAULT_OPENPGP_USER_PIN,
} from '../params/openpgp_parameters';
import { NativeTool, ToolContext } from './native_tool';
import { PinChanger } from './types';

/**
 * SELECT by name of the OpenPGP application (RID D276000124, application 01).
 */
const SELECT_OPENPGP_APPLET = '00:A4:04:00:06:D2:76:00:01:24:01';

const CHANGE_REFERENCE_DATA = '00:24:00';
const USER_PIN_REFERENCE = '81';
const ADMIN_PIN_REFERENCE = '83';

const STATUS_WORD_PATTERN = /SW1=0x([0-9a-f]{2}), SW2=0x([0-9a-f]{2})/gi;
const STATUS_OK = '9000';

function toColonHex(bytes: Buffer): string {
  return [...bytes]
    .map((byte) => byte.toString(16).toUpperCase().padStart(2, '0'))
    .join(':');
}

/**
 * CHANGE REFERENCE DATA with the old and new PIN concatenated, as the OpenPGP
 * card expects.
 */
function changeReferenceData(
  reference: string,
  oldPin: string,
  newPin: string
): string {
  const data = Buffer.from(`${oldPin}${newPin}`, 'ascii');
  const lc = data.length.toString(16).toUpperCase().padStart(2, '0');
  return `${CHANGE_REFERENCE_DATA}:${reference}:${lc}:${toColonHex(data)}`;
}

/**
 * The opensc-explorer script that changes the user PIN (PW1) and admin PIN
 * (PW3), one `apdu` command per line.
 */
export function buildPinChangeScript(
  desired: OpenPgpPins,
  current?: OpenPgpPins
): string {
  const oldPin = current?.pin ?? DEFAULT_OPENPGP_USER_PIN;
  const oldAdminPin = current?.adminPin ?? DEFAULT_OPENPGP_ADMIN_PIN;
  return [
    `apdu ${SELECT_OPENPGP_APPLET}`,
    `apdu ${changeReferenceData(USER_PIN_REFERENCE, oldPin, desired.pin)}`,
    `apdu ${changeReferenceData(
      ADMIN_PIN_REFERENCE,
      oldAdminPin,
      desired.adminPin
    )}`,
    '',
  ].join('\n');
}

const SCRIPT_STEPS = ['SELECT', 'PW1 change', 'PW3 change'] as const;

/**
 * Status words opensc-explorer printed for each APDU, e.g. `['9000', '6982']`.
 */
export function parseStatusWords(output: string): string[] {
  return [...output.matchAll(STATUS_WORD_PATTERN)].map(
    ([, sw1, sw2]) => `${sw1}${sw2}`.toUpperCase()
  );
}

/**
 * OpenSC's `opensc-explorer`, driven by a script on stdin.
 */
export class OpenScExplorer extends NativeTool implements PinChanger {
  constructor(context: ToolContext) {
    super('opensc-explorer', context);
  }

  async changePins({
    desired,
    current,
  }: {
    desired: OpenPgpPins;
    current?: OpenPgpPins;
  }): Promise<void> {
    desired.validate();
    current?.validate();
    const result = await this.runChecked(this.verboseArgs(), {
      stdin: buildPinChangeScript(desired, current),
    });

    // opensc-explorer exits 0 even when the card refuses a command or an
    // APDU never reaches it, so every step must report its own status word
    const statusWords = parseStatusWords(result.stdout);
    SCRIPT_STEPS.forEach((step, index) => {
      const statusWord = statusWords[index];
      if (statusWord === undefined) {
        throw this.failure(result, `card did not answer ${step}`);
      }
      if (statusWord !== STATUS_OK) {
        throw this.failure(
          result,
          `card answered ${step} with status ${statusWord}`
        );
      }
    });
    if (statusWords.length > SCRIPT_STEPS.length) {
      throw this.failure(
        result,
        `expected ${SCRIPT_STEPS.length} card answers, got ${statusWords.length}`
      );
    }
  }
}
