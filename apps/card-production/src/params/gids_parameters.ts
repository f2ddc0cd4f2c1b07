import { z } from 'zod';
import { randomDigits, randomHex } from './random';
import { ParameterRecord, ParameterRecordType } from './record_type';
import { assertCanonicalHex, requireDigits, requireHex } from './validation';

const ADMIN_KEY_LENGTH = 48;
const SERIAL_NUMBER_LENGTH = 32;
const PIN_LENGTH = 6;

export type GidsAppletParametersFields = {
  admin_key: string;
  sn: string;
  pin: string;
};

/**
 * Initialization parameters for a card running GidsApplet. The PIN is what
 * the card holder uses; the admin key and serial number are set once.
 */
export class GidsAppletParameters
  implements ParameterRecord<GidsAppletParameters>
{
  readonly adminKey: string;
  readonly serialNumber: string;
  readonly pin: string;

  constructor(fields: GidsAppletParametersFields) {
    this.adminKey = requireHex('admin_key', fields.admin_key, {
      length: ADMIN_KEY_LENGTH,
      letterCase: 'upper',
    });
    this.serialNumber = requireHex('sn', fields.sn, {
      length: SERIAL_NUMBER_LENGTH,
      letterCase: 'upper',
    });
    this.pin = requireDigits('pin', fields.pin, { length: PIN_LENGTH });
  }

  static generate(): GidsAppletParameters {
    return new GidsAppletParameters({
      admin_key: randomHex(ADMIN_KEY_LENGTH),
      sn: randomHex(SERIAL_NUMBER_LENGTH),
      pin: randomDigits(PIN_LENGTH),
    });
  }

  validate(): void {
    assertCanonicalHex('admin_key', this.adminKey, {
      length: ADMIN_KEY_LENGTH,
      letterCase: 'upper',
    });
    assertCanonicalHex('sn', this.serialNumber, {
      length: SERIAL_NUMBER_LENGTH,
      letterCase: 'upper',
    });
    requireDigits('pin', this.pin, { length: PIN_LENGTH });
  }

  equals(other?: GidsAppletParameters): boolean {
    return (
      other !== undefined &&
      other.adminKey === this.adminKey &&
      other.serialNumber === this.serialNumber &&
      other.pin === this.pin
    );
  }

  toFields(): GidsAppletParametersFields {
    return { admin_key: this.adminKey, sn: this.serialNumber, pin: this.pin };
  }
}

export const GidsAppletParametersRecord: ParameterRecordType<
  GidsAppletParameters,
  GidsAppletParametersFields
> = {
  description: 'GidsApplet parameters',
  fieldsSchema: z
    .object({ admin_key: z.string(), sn: z.string(), pin: z.string() })
    .strict(),
  fromFields: (fields) => new GidsAppletParameters(fields),
  generate: () => GidsAppletParameters.generate(),
};
