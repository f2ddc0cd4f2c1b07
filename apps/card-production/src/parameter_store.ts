import {
  Result,
  err,
  extractErrorMessage,
  ok,
  throwIllegalValue,
} from '@cardprod/basics';
import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import { parse as parseToml, stringify as stringifyToml } from '@iarna/toml';
import { outputFile } from 'fs-extra';
import { readFile } from 'fs/promises';
import { ConfigError, ValidationError } from './errors';
import {
  ParameterRecord,
  ParameterRecordType,
  RecordFields,
} from './params/record_type';
import { describeZodError } from './schema';

/**
 * Why a record could not be loaded. Only `not-found` may lead to generating a
 * new record; anything else means a file exists that we don't understand.
 */
export type LoadRecordError =
  | { type: 'not-found'; path: string }
  | { type: 'read-error'; path: string; message: string }
  | { type: 'parse-error'; path: string; message: string }
  | { type: 'invalid-record'; path: string; error: ValidationError };

// fs errors may come from another realm, so no `instanceof Error` here
function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

/**
 * Describes a load failure for an operator.
 */
export function describeLoadRecordError(
  description: string,
  error: LoadRecordError
): string {
  switch (error.type) {
    case 'not-found':
      return `${description} file ${error.path} does not exist`;
    case 'read-error':
      return `Could not read ${description} file ${error.path}: ${error.message}`;
    case 'parse-error':
      return `Could not parse ${description} file ${error.path}: ${error.message}`;
    case 'invalid-record':
      return `Invalid ${description} in ${error.path}: ${error.error.message}`;
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(error);
  }
}

/**
 * Reads and writes parameter records, one TOML file per record. A record's
 * identity is its path.
 */
export class ParameterStore {
  private readonly logger: Logger;

  constructor({ logger }: { logger: Logger }) {
    this.logger = logger;
  }

  async load<R extends ParameterRecord<R>, F extends RecordFields>(
    path: string,
    recordType: ParameterRecordType<R, F>
  ): Promise<Result<R, LoadRecordError>> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return err({ type: 'not-found', path });
      }
      return err({
        type: 'read-error',
        path,
        message: extractErrorMessage(error),
      });
    }

    let parsed: unknown;
    try {
      parsed = parseToml(contents);
    } catch (error) {
      return err({
        type: 'parse-error',
        path,
        message: extractErrorMessage(error),
      });
    }

    const fields = recordType.fieldsSchema.safeParse(parsed);
    if (!fields.success) {
      return err({
        type: 'parse-error',
        path,
        message: describeZodError(fields.error),
      });
    }

    try {
      return ok(recordType.fromFields(fields.data));
    } catch (error) {
      if (error instanceof ValidationError) {
        return err({ type: 'invalid-record', path, error });
      }
      throw error;
    }
  }

  /**
   * Writes `record` to `path`, creating parent directories. Unless
   * `overwrite` is set, an existing file is left alone and a
   * {@link ConfigError} is thrown.
   */
  async save<R extends ParameterRecord<R>>(
    path: string,
    record: R,
    { overwrite = false }: { overwrite?: boolean } = {}
  ): Promise<void> {
    record.validate();
    try {
      await outputFile(path, stringifyToml(record.toFields()), {
        encoding: 'utf-8',
        mode: 0o600,
        flag: overwrite ? 'w' : 'wx',
      });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new ConfigError(
          `${path} already exists; refusing to overwrite it`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  /**
   * Loads the record at `path`, or generates and saves a new one if there is
   * no file there. A file that exists but can't be read or parsed is an error:
   * replacing it would lose the secrets of a card provisioned with it.
   */
  async loadOrGenerate<R extends ParameterRecord<R>, F extends RecordFields>(
    path: string,
    recordType: ParameterRecordType<R, F>
  ): Promise<R> {
    const result = await this.load(path, recordType);
    if (result.isOk()) {
      await this.logLoaded(path, recordType);
      return result.ok();
    }

    const error = result.err();
    if (error.type !== 'not-found') {
      throw new ConfigError(
        describeLoadRecordError(recordType.description, error),
        { cause: error.type === 'invalid-record' ? error.error : undefined }
      );
    }

    this.logger.debug(
      '%s not found at %s, generating',
      recordType.description,
      path
    );
    const record = recordType.generate();
    await this.save(path, record);
    await this.logger.log(LogEventId.ParameterRecordGenerated, 'system', {
      message: `Generated random ${recordType.description} and saved them to ${path}`,
      disposition: LogDispositionStandardTypes.Success,
      path,
    });
    return record;
  }

  /**
   * Loads the record at `path`, which must exist. Used for values already on
   * a card, which can't be made up.
   */
  async loadRequired<R extends ParameterRecord<R>, F extends RecordFields>(
    path: string,
    recordType: ParameterRecordType<R, F>
  ): Promise<R> {
    const result = await this.load(path, recordType);
    if (result.isErr()) {
      const error = result.err();
      throw new ConfigError(
        describeLoadRecordError(recordType.description, error),
        { cause: error.type === 'invalid-record' ? error.error : undefined }
      );
    }
    await this.logLoaded(path, recordType);
    return result.ok();
  }

  private async logLoaded<
    R extends ParameterRecord<R>,
    F extends RecordFields,
  >(
    path: string,
    recordType: ParameterRecordType<R, F>
  ): Promise<void> {
    await this.logger.log(LogEventId.ParameterRecordLoaded, 'system', {
      message: `Loaded ${recordType.description} from ${path}`,
      disposition: LogDispositionStandardTypes.Success,
      path,
    });
  }
}
