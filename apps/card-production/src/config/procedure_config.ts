import { extractErrorMessage } from '@cardprod/basics';
import { parse as parseToml } from '@iarna/toml';
import { pathExists } from 'fs-extra';
import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, ValidationError } from '../errors';
import {
  DEFAULT_MANUFACTURER_CODE,
  requireManufacturerCode,
} from '../params/openpgp_parameters';
import { describeZodError } from '../schema';

export type ProcedureFamily = 'gids' | 'smartpgp';

/**
 * Where the GlobalPlatform lock keys live. A missing desired file means the
 * card should end up with the factory default key; a missing current file
 * means it has the factory default key now.
 */
export interface GpConfig {
  readonly currentParametersFilename?: string;
  readonly desiredParametersFilename?: string;
}

export interface PinConfig {
  readonly currentPinsFilename?: string;
  readonly desiredPinsFilename?: string;
}

/**
 * A credential to import onto a GIDS card under `label`.
 */
export interface KeyLoadingRequest {
  readonly label: string;
  readonly key: {
    readonly filename: string;
    readonly passphrase?: string;
  };
}

export interface GidsProcedureConfig {
  readonly family: 'gids';
  readonly gidsParametersFilename: string;
  readonly installAndInitGids: boolean;
  readonly gpConfig: GpConfig;
  readonly keyLoading: readonly KeyLoadingRequest[];
}

export interface SmartPgpProcedureConfig {
  readonly family: 'smartpgp';
  readonly openPgpInstallParametersFilename: string;
  readonly installSmartPgp: boolean;
  readonly manufacturerCode: string;
  readonly gpConfig: GpConfig;
  readonly pinConfig: PinConfig;
}

export type ProcedureConfig = GidsProcedureConfig | SmartPgpProcedureConfig;

const GpConfigSchema = z
  .object({
    current_parameters_filename: z.string().min(1).optional(),
    desired_parameters_filename: z.string().min(1).optional(),
  })
  .strict();

const PinConfigSchema = z
  .object({
    current_pins_filename: z.string().min(1).optional(),
    desired_pins_filename: z.string().min(1).optional(),
  })
  .strict();

const KeyLoadingRequestSchema = z
  .object({
    label: z.string().min(1),
    key: z
      .object({
        filename: z.string().min(1),
        passphrase: z.string().optional(),
      })
      .strict(),
  })
  .strict();

export const GidsProcedureFileSchema = z
  .object({
    gids_parameters_filename: z.string().min(1),
    install_and_init_gids: z.boolean().default(false),
    gp_config: GpConfigSchema.default({}),
    key_loading: z.array(KeyLoadingRequestSchema).default([]),
  })
  .strict();

export const SmartPgpProcedureFileSchema = z
  .object({
    openpgp_install_parameters_filename: z.string().min(1),
    install_smartpgp: z.boolean().default(false),
    manufacturer_code: z.string().default(DEFAULT_MANUFACTURER_CODE),
    gp_config: GpConfigSchema.default({}),
    pin_config: PinConfigSchema.default({}),
  })
  .strict();

function resolveOptional(
  baseDirectory: string,
  filename?: string
): string | undefined {
  return filename === undefined ? undefined : resolve(baseDirectory, filename);
}

function toGpConfig(
  baseDirectory: string,
  gpConfig: z.infer<typeof GpConfigSchema>
): GpConfig {
  return {
    currentParametersFilename: resolveOptional(
      baseDirectory,
      gpConfig.current_parameters_filename
    ),
    desiredParametersFilename: resolveOptional(
      baseDirectory,
      gpConfig.desired_parameters_filename
    ),
  };
}

/**
 * Guesses the family of a parsed procedure file from its required key.
 */
function detectFamily(
  contents: Record<string, unknown>
): ProcedureFamily | undefined {
  if ('gids_parameters_filename' in contents) {
    return 'gids';
  }
  if ('openpgp_install_parameters_filename' in contents) {
    return 'smartpgp';
  }
  return undefined;
}

/**
 * Parses the text of a procedure file. Relative file names are resolved
 * against `baseDirectory`, usually the directory of the procedure file.
 */
export function parseProcedureConfig(
  text: string,
  {
    baseDirectory,
    family,
    source = 'procedure file',
  }: { baseDirectory: string; family?: ProcedureFamily; source?: string }
): ProcedureConfig {
  let contents: Record<string, unknown>;
  try {
    contents = parseToml(text);
  } catch (error) {
    throw new ConfigError(
      `Could not parse ${source}: ${extractErrorMessage(error)}`,
      { cause: error }
    );
  }

  const detectedFamily = detectFamily(contents) ?? family;
  if (detectedFamily === undefined) {
    throw new ConfigError(
      `Expected gids_parameters_filename or openpgp_install_parameters_filename in ${source}`
    );
  }
  if (family !== undefined && detectedFamily !== family) {
    throw new ConfigError(
      `Expected a ${family} procedure in ${source}, found a ${detectedFamily} procedure`
    );
  }

  if (detectedFamily === 'gids') {
    const parsed = GidsProcedureFileSchema.safeParse(contents);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid ${source}: ${describeZodError(parsed.error)}`
      );
    }
    const config = parsed.data;
    return {
      family: 'gids',
      gidsParametersFilename: resolve(
        baseDirectory,
        config.gids_parameters_filename
      ),
      installAndInitGids: config.install_and_init_gids,
      gpConfig: toGpConfig(baseDirectory, config.gp_config),
      keyLoading: config.key_loading.map((request) => ({
        label: request.label,
        key: {
          filename: resolve(baseDirectory, request.key.filename),
          passphrase: request.key.passphrase,
        },
      })),
    };
  }

  const parsed = SmartPgpProcedureFileSchema.safeParse(contents);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid ${source}: ${describeZodError(parsed.error)}`
    );
  }
  const config = parsed.data;
  let manufacturerCode: string;
  try {
    manufacturerCode = requireManufacturerCode(config.manufacturer_code);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigError(`Invalid ${source}: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
  return {
    family: 'smartpgp',
    openPgpInstallParametersFilename: resolve(
      baseDirectory,
      config.openpgp_install_parameters_filename
    ),
    installSmartPgp: config.install_smartpgp,
    manufacturerCode,
    gpConfig: toGpConfig(baseDirectory, config.gp_config),
    pinConfig: {
      currentPinsFilename: resolveOptional(
        baseDirectory,
        config.pin_config.current_pins_filename
      ),
      desiredPinsFilename: resolveOptional(
        baseDirectory,
        config.pin_config.desired_pins_filename
      ),
    },
  };
}

/**
 * Checks that every PKCS#12 bundle named by a GIDS procedure exists.
 */
export async function assertKeyFilesExist(
  config: ProcedureConfig
): Promise<void> {
  if (config.family !== 'gids') {
    return;
  }
  for (const request of config.keyLoading) {
    if (!(await pathExists(request.key.filename))) {
      throw new ConfigError(
        `Key file ${request.key.filename} for label '${request.label}' does not exist`
      );
    }
  }
}

/**
 * Reads a procedure file. If `family` is given, the file must describe a
 * procedure of that family.
 */
export async function loadProcedureConfig(
  path: string,
  { family }: { family?: ProcedureFamily } = {}
): Promise<ProcedureConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Could not read procedure file ${path}: ${extractErrorMessage(error)}`,
      { cause: error }
    );
  }

  const config = parseProcedureConfig(text, {
    baseDirectory: dirname(resolve(path)),
    family,
    source: `procedure file ${path}`,
  });
  await assertKeyFilesExist(config);
  return config;
}
