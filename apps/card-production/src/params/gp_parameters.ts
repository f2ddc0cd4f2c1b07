import { z } from 'zod';
import { randomHex } from './random';
import { ParameterRecord, ParameterRecordType } from './record_type';
import { assertCanonicalHex, requireHex } from './validation';

/**
 * The GlobalPlatform key cards ship with.
 */
export const DEFAULT_GP_KEY = '404142434445464748494A4B4C4D4E4F';

const GP_KEY_LENGTH = 32;

export type GpParametersFields = {
  key: string;
};

/**
 * The GlobalPlatform lock key of a card.
 */
export class GpParameters implements ParameterRecord<GpParameters> {
  readonly key: string;

  constructor({ key }: GpParametersFields) {
    this.key = requireHex('key', key, {
      length: GP_KEY_LENGTH,
      letterCase: 'upper',
    });
  }

  static factoryDefault(): GpParameters {
    return new GpParameters({ key: DEFAULT_GP_KEY });
  }

  static generate(): GpParameters {
    return new GpParameters({ key: randomHex(GP_KEY_LENGTH) });
  }

  validate(): void {
    assertCanonicalHex('key', this.key, {
      length: GP_KEY_LENGTH,
      letterCase: 'upper',
    });
  }

  isFactoryDefault(): boolean {
    return this.key === DEFAULT_GP_KEY;
  }

  equals(other?: GpParameters): boolean {
    return other !== undefined && other.key === this.key;
  }

  toFields(): GpParametersFields {
    return { key: this.key };
  }
}

export const GpParametersRecord: ParameterRecordType<
  GpParameters,
  GpParametersFields
> = {
  description: 'GlobalPlatform parameters',
  fieldsSchema: z.object({ key: z.string() }).strict(),
  fromFields: (fields) => new GpParameters(fields),
  generate: () => GpParameters.generate(),
};
