import { z } from 'zod';

/**
 * The persisted form of a record: snake_case field names to string values.
 */
export type RecordFields = Record<string, string>;

/**
 * A validated group of card parameters. Records normalize on construction
 * and compare structurally.
 */
export interface ParameterRecord<Self> {
  /**
   * Re-checks every field. Call before any destructive use.
   */
  validate(): void;
  equals(other?: Self): boolean;
  toFields(): RecordFields;
}

/**
 * What the parameter store needs to know about a kind of record.
 */
export interface ParameterRecordType<
  R extends ParameterRecord<R>,
  F extends RecordFields = RecordFields,
> {
  /**
   * Human-readable name used in log lines and errors.
   */
  readonly description: string;
  readonly fieldsSchema: z.ZodType<F, z.ZodTypeDef, unknown>;
  fromFields(fields: F): R;
  generate(): R;
}
