import * as dotenv from 'dotenv';
import * as dotenvExpand from 'dotenv-expand';
import fs from 'fs';
import { ToolkitSettings, splitCommand } from './toolkit';

// Load environment variables from .env* files in the working directory.
// dotenv never modifies variables that are already set, and variable expansion
// is supported in .env files.
const dotEnvPath = '.env';
const dotenvFiles: string[] = [`${dotEnvPath}.local`, dotEnvPath];

for (const dotenvFile of dotenvFiles) {
  if (fs.existsSync(dotenvFile)) {
    dotenvExpand.expand(dotenv.config({ path: dotenvFile }));
  }
}

/**
 * How to run GlobalPlatformPro.
 */
export const GP_COMMAND = process.env.GP_COMMAND ?? 'java -jar gp.jar';

export const GIDS_TOOL = process.env.GIDS_TOOL ?? 'gids-tool';
export const PKCS15_INIT = process.env.PKCS15_INIT ?? 'pkcs15-init';
export const PKCS15_TOOL = process.env.PKCS15_TOOL ?? 'pkcs15-tool';
export const OPENPGP_TOOL = process.env.OPENPGP_TOOL ?? 'openpgp-tool';
export const OPENSC_EXPLORER = process.env.OPENSC_EXPLORER ?? 'opensc-explorer';

/**
 * Applet builds to install, relative to the working directory unless absolute.
 */
export const GIDS_CAP_FILE =
  process.env.GIDS_CAP_FILE ?? 'GidsApplet-import4k-1.3-20231219.cap';
export const SMARTPGP_CAP_FILE =
  process.env.SMARTPGP_CAP_FILE ??
  'SmartPGP-v1.22.2-jc304-without_sm-rsa_up_to_4096.cap';

export function getToolkitSettings(): ToolkitSettings {
  return {
    gpCommand: splitCommand('GP_COMMAND', GP_COMMAND),
    gidsToolCommand: splitCommand('GIDS_TOOL', GIDS_TOOL),
    pkcs15InitCommand: splitCommand('PKCS15_INIT', PKCS15_INIT),
    pkcs15ToolCommand: splitCommand('PKCS15_TOOL', PKCS15_TOOL),
    openPgpToolCommand: splitCommand('OPENPGP_TOOL', OPENPGP_TOOL),
    openScExplorerCommand: splitCommand('OPENSC_EXPLORER', OPENSC_EXPLORER),
    gidsCapFile: GIDS_CAP_FILE,
    smartPgpCapFile: SMARTPGP_CAP_FILE,
  };
}
