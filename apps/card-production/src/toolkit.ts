import { Logger } from '@cardprod/logging';
import { pathExists } from 'fs-extra';
import { ConfigError } from './errors';
import { GlobalPlatformPro } from './tools/global_platform';
import { GidsTool } from './tools/gids_tool';
import { OpenPgpTool } from './tools/openpgp_tool';
import { OpenScExplorer } from './tools/opensc_explorer';
import { Pkcs15Init } from './tools/pkcs15_init';
import { Pkcs15Tool } from './tools/pkcs15_tool';
import { CommandRunner, runCommand } from './tools/shell';
import { GidsToolkit, ReinsertPrompt, SmartPgpToolkit } from './tools/types';

/**
 * Where the native tools and applets are. Every command is a base command
 * line, split into words.
 */
export interface ToolkitSettings {
  readonly gpCommand: readonly string[];
  readonly gidsToolCommand: readonly string[];
  readonly pkcs15InitCommand: readonly string[];
  readonly pkcs15ToolCommand: readonly string[];
  readonly openPgpToolCommand: readonly string[];
  readonly openScExplorerCommand: readonly string[];
  readonly gidsCapFile: string;
  readonly smartPgpCapFile: string;
}

/**
 * Splits a command line from configuration on whitespace. There is no
 * quoting.
 */
export function splitCommand(name: string, commandLine: string): string[] {
  const words = commandLine.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    throw new ConfigError(`${name} must not be empty`);
  }
  return words;
}

async function assertCapFileExists(
  appletName: string,
  capFile: string
): Promise<void> {
  if (!(await pathExists(capFile))) {
    throw new ConfigError(`Could not find ${appletName} cap file ${capFile}`);
  }
}

interface ToolkitOptions {
  settings: ToolkitSettings;
  logger: Logger;
  verbose: boolean;
  promptReinsert: ReinsertPrompt;
  runner?: CommandRunner;
}

export async function createGidsToolkit({
  settings,
  logger,
  verbose,
  promptReinsert,
  runner = runCommand,
}: ToolkitOptions): Promise<GidsToolkit> {
  await assertCapFileExists('GidsApplet', settings.gidsCapFile);
  logger.debug('will use cap file %s', settings.gidsCapFile);
  const context = { runner, logger, verbose };
  return {
    capFile: settings.gidsCapFile,
    gp: new GlobalPlatformPro({ ...context, command: settings.gpCommand }),
    gids: new GidsTool({ ...context, command: settings.gidsToolCommand }),
    keyImporter: new Pkcs15Init({
      ...context,
      command: settings.pkcs15InitCommand,
    }),
    certificates: new Pkcs15Tool({
      ...context,
      command: settings.pkcs15ToolCommand,
    }),
    promptReinsert,
  };
}

export async function createSmartPgpToolkit({
  settings,
  logger,
  verbose,
  promptReinsert,
  runner = runCommand,
}: ToolkitOptions): Promise<SmartPgpToolkit> {
  await assertCapFileExists('SmartPGP', settings.smartPgpCapFile);
  logger.debug('will use cap file %s', settings.smartPgpCapFile);
  const context = { runner, logger, verbose };
  return {
    capFile: settings.smartPgpCapFile,
    gp: new GlobalPlatformPro({ ...context, command: settings.gpCommand }),
    openPgp: new OpenPgpTool({
      ...context,
      command: settings.openPgpToolCommand,
    }),
    pinChanger: new OpenScExplorer({
      ...context,
      command: settings.openScExplorerCommand,
    }),
    promptReinsert,
  };
}
