import { z } from 'zod';
import { ValidationError } from '../errors';
import { randomDigits, randomHex } from './random';
import { ParameterRecord, ParameterRecordType } from './record_type';
import { assertCanonicalHex, requireDigits, requireHex } from './validation';

const SERIAL_NUMBER_LENGTH = 8;
const MANUFACTURER_CODE_LENGTH = 4;

/**
 * Manufacturer codes `fff0` through `fffe` are set aside for serial numbers
 * assigned at random without registration. `ffff` is reserved.
 */
export const RANDOM_ASSIGNMENT_MANUFACTURER_CODES = {
  min: 0xfff0,
  max: 0xfffe,
} as const;

export const DEFAULT_MANUFACTURER_CODE = 'fff5';

/**
 * Registered application identifier prefix of OpenPGP card applets, version
 * 3.4.
 */
export const OPENPGP_AID_PREFIX = 'd276000124010304';

const USER_PIN_LENGTH = { min: 6, max: 127 } as const;
const ADMIN_PIN_LENGTH = { min: 8, max: 127 } as const;
const GENERATED_USER_PIN_LENGTH = 6;
const GENERATED_ADMIN_PIN_LENGTH = 8;

export const DEFAULT_OPENPGP_USER_PIN = '123456';
export const DEFAULT_OPENPGP_ADMIN_PIN = '12345678';

/**
 * Validates a manufacturer code and returns it in lowercase.
 */
export function requireManufacturerCode(value: string): string {
  return requireHex('manufacturer_code', value, {
    length: MANUFACTURER_CODE_LENGTH,
    letterCase: 'lower',
  });
}

/**
 * Whether serial numbers under `manufacturerCode` may be generated at random.
 * Anything outside `fff0`..`fffe` needs a registered code and managed serial
 * numbers.
 */
export function isRandomAssignmentManufacturerCode(
  manufacturerCode: string
): boolean {
  const value = Number.parseInt(requireManufacturerCode(manufacturerCode), 16);
  return (
    value >= RANDOM_ASSIGNMENT_MANUFACTURER_CODES.min &&
    value <= RANDOM_ASSIGNMENT_MANUFACTURER_CODES.max
  );
}

export type OpenPgpInstallParametersFields = {
  sn: string;
  manufacturer_code: string;
};

/**
 * What goes into the application identifier when SmartPGP is installed.
 */
export class OpenPgpInstallParameters
  implements ParameterRecord<OpenPgpInstallParameters>
{
  readonly serialNumber: string;
  readonly manufacturerCode: string;

  constructor(fields: OpenPgpInstallParametersFields) {
    this.serialNumber = requireHex('sn', fields.sn, {
      length: SERIAL_NUMBER_LENGTH,
      letterCase: 'upper',
    });
    this.manufacturerCode = requireManufacturerCode(fields.manufacturer_code);
  }

  /**
   * Random serial number under `manufacturerCode`, which must be in the
   * random assignment range.
   */
  static generate(
    manufacturerCode = DEFAULT_MANUFACTURER_CODE
  ): OpenPgpInstallParameters {
    if (!isRandomAssignmentManufacturerCode(manufacturerCode)) {
      throw new ValidationError(
        'manufacturer_code',
        'a code from fff0 to fffe to generate a random serial number',
        manufacturerCode
      );
    }
    return new OpenPgpInstallParameters({
      sn: randomHex(SERIAL_NUMBER_LENGTH),
      manufacturer_code: manufacturerCode,
    });
  }

  validate(): void {
    assertCanonicalHex('sn', this.serialNumber, {
      length: SERIAL_NUMBER_LENGTH,
      letterCase: 'upper',
    });
    assertCanonicalHex('manufacturer_code', this.manufacturerCode, {
      length: MANUFACTURER_CODE_LENGTH,
      letterCase: 'lower',
    });
  }

  isRandomAssignment(): boolean {
    return isRandomAssignmentManufacturerCode(this.manufacturerCode);
  }

  /**
   * The instance AID the applet is created with.
   */
  applicationIdentifier(): string {
    this.validate();
    return `${OPENPGP_AID_PREFIX}${this.manufacturerCode}${this.serialNumber}0000`;
  }

  equals(other?: OpenPgpInstallParameters): boolean {
    return (
      other !== undefined &&
      other.serialNumber === this.serialNumber &&
      other.manufacturerCode === this.manufacturerCode
    );
  }

  toFields(): OpenPgpInstallParametersFields {
    return { sn: this.serialNumber, manufacturer_code: this.manufacturerCode };
  }
}

/**
 * Builds the install parameters record type. The manufacturer code only
 * matters when a new record is generated.
 */
export function openPgpInstallParametersRecord(
  manufacturerCode = DEFAULT_MANUFACTURER_CODE
): ParameterRecordType<OpenPgpInstallParameters, OpenPgpInstallParametersFields> {
  return {
    description: 'OpenPGP install parameters',
    fieldsSchema: z
      .object({
        sn: z.string(),
        manufacturer_code: z.string().default(DEFAULT_MANUFACTURER_CODE),
      })
      .strict(),
    fromFields: (fields) => new OpenPgpInstallParameters(fields),
    generate: () => OpenPgpInstallParameters.generate(manufacturerCode),
  };
}

export type OpenPgpPinsFields = {
  pin: string;
  admin_pin: string;
};

/**
 * User (PW1) and admin (PW3) PINs of the OpenPGP applet.
 */
export class OpenPgpPins implements ParameterRecord<OpenPgpPins> {
  readonly pin: string;
  readonly adminPin: string;

  constructor(fields: OpenPgpPinsFields) {
    this.pin = requireDigits('pin', fields.pin, { length: USER_PIN_LENGTH });
    this.adminPin = requireDigits('admin_pin', fields.admin_pin, {
      length: ADMIN_PIN_LENGTH,
    });
  }

  static factoryDefault(): OpenPgpPins {
    return new OpenPgpPins({
      pin: DEFAULT_OPENPGP_USER_PIN,
      admin_pin: DEFAULT_OPENPGP_ADMIN_PIN,
    });
  }

  static generate(): OpenPgpPins {
    return new OpenPgpPins({
      pin: randomDigits(GENERATED_USER_PIN_LENGTH),
      admin_pin: randomDigits(GENERATED_ADMIN_PIN_LENGTH),
    });
  }

  validate(): void {
    requireDigits('pin', this.pin, { length: USER_PIN_LENGTH });
    requireDigits('admin_pin', this.adminPin, { length: ADMIN_PIN_LENGTH });
  }

  equals(other?: OpenPgpPins): boolean {
    return (
      other !== undefined &&
      other.pin === this.pin &&
      other.adminPin === this.adminPin
    );
  }

  toFields(): OpenPgpPinsFields {
    return { pin: this.pin, admin_pin: this.adminPin };
  }
}

export const OpenPgpPinsRecord: ParameterRecordType<
  OpenPgpPins,
  OpenPgpPinsFields
> = {
  description: 'OpenPGP PINs',
  fieldsSchema: z
    .object({ pin: z.string(), admin_pin: z.string() })
    .strict(),
  fromFields: (fields) => new OpenPgpPins(fields),
  generate: () => OpenPgpPins.generate(),
};
