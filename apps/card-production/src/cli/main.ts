#!/usr/bin/env node
import {
  assert,
  extractErrorMessage,
  throwIllegalValue,
} from '@cardprod/basics';
import {
  LogDispositionStandardTypes,
  LogEventId,
  LogSource,
  Logger,
} from '@cardprod/logging';
import yargs from 'yargs/yargs';
import { z } from 'zod';
import {
  ProcedureFamily,
  loadProcedureConfig,
} from '../config/procedure_config';
import { getToolkitSettings } from '../globals';
import { createReinsertPrompt } from '../operator';
import { ParameterStore } from '../parameter_store';
import { generateParameters } from '../procedures/generate_parameters';
import { produceGids } from '../procedures/produce_gids';
import { produceSmartPgp } from '../procedures/produce_smartpgp';
import { describeZodError } from '../schema';
import {
  ToolkitSettings,
  createGidsToolkit,
  createSmartPgpToolkit,
} from '../toolkit';
import { CommandRunner, runCommand } from '../tools/shell';

const COMMANDS = [
  'generate-parameters',
  'produce-gids',
  'produce-smartpgp',
] as const;
type Command = (typeof COMMANDS)[number];

const CommandLineArgsSchema = z.object({
  _: z.tuple([z.enum(COMMANDS)]),
  procedureFile: z.string(),
  verbose: z.boolean(),
});

interface CommandLineArgs {
  command: Command;
  procedureFile: string;
  verbose: boolean;
}

/**
 * Resolves to `undefined` if help was requested and printed.
 */
async function parseCommandLineArgs(
  argv: readonly string[]
): Promise<CommandLineArgs | undefined> {
  const argParser = yargs()
    .scriptName('card-production')
    .command(
      'generate-parameters <procedure-file>',
      'Generate any missing parameter files of a procedure without touching a card'
    )
    .command(
      'produce-gids <procedure-file>',
      'Set up a card with GidsApplet and import keys'
    )
    .command(
      'produce-smartpgp <procedure-file>',
      'Set up a card with the SmartPGP applet'
    )
    .options({
      verbose: {
        alias: 'v',
        description: 'Verbose logging',
        type: 'boolean',
        default: false,
      },
      help: {
        alias: 'h',
        description: 'Show help',
        type: 'boolean',
        default: false,
      },
    })
    .help(false)
    .version(false)
    .wrap(null)
    .exitProcess(false)
    .example('$ card-production generate-parameters procedure.toml', '')
    .example('$ card-production produce-gids --verbose procedure.toml', '')
    .example('$ card-production produce-smartpgp procedure.toml', '')
    .demandCommand(1, 'Must specify a command')
    .strict();

  const helpMessage = await argParser.getHelp();
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    console.log(helpMessage);
    return undefined;
  }

  argParser.fail((errorMessage: string) => {
    throw new Error(`${errorMessage}\n\n${helpMessage}`);
  });

  const parsed = CommandLineArgsSchema.safeParse(await argParser.parse(argv));
  if (!parsed.success) {
    throw new Error(
      `Invalid arguments: ${describeZodError(parsed.error)}\n\n${helpMessage}`
    );
  }
  const args = parsed.data;
  return {
    command: args._[0],
    procedureFile: args.procedureFile,
    verbose: args.verbose,
  };
}

function familyOfCommand(command: Command): ProcedureFamily | undefined {
  switch (command) {
    case 'generate-parameters':
      return undefined;
    case 'produce-gids':
      return 'gids';
    case 'produce-smartpgp':
      return 'smartpgp';
    /* istanbul ignore next: Compile-time check for completeness */
    default:
      throwIllegalValue(command);
  }
}

export interface MainOptions {
  /** Defaults to the settings from the environment. */
  settings?: ToolkitSettings;
  runner?: CommandRunner;
  /** Where the reinsert prompt goes. Defaults to stderr. */
  writePrompt?: (text: string) => void;
}

async function runProcedure(
  { command, procedureFile, verbose }: CommandLineArgs,
  logger: Logger,
  { settings, runner = runCommand, writePrompt }: MainOptions
): Promise<void> {
  const config = await loadProcedureConfig(procedureFile, {
    family: familyOfCommand(command),
  });
  await logger.log(LogEventId.ProcedureConfigLoaded, 'operator', {
    message: `Loaded ${config.family} procedure from ${procedureFile}`,
    disposition: LogDispositionStandardTypes.Success,
    procedureFile,
  });

  const store = new ParameterStore({
    logger: logger.withSource(LogSource.ParameterStore),
  });

  if (command === 'generate-parameters') {
    await generateParameters({ config, store, logger });
    return;
  }

  const toolkitOptions = {
    settings: settings ?? getToolkitSettings(),
    logger,
    verbose,
    runner,
  };

  if (command === 'produce-gids') {
    assert(config.family === 'gids');
    const procedureLogger = logger.withSource(LogSource.GidsProcedure);
    await produceGids({
      config,
      store,
      toolkit: await createGidsToolkit({
        ...toolkitOptions,
        logger: procedureLogger,
        promptReinsert: createReinsertPrompt({
          logger: procedureLogger,
          write: writePrompt,
        }),
      }),
      logger: procedureLogger,
    });
    return;
  }

  assert(config.family === 'smartpgp');
  const procedureLogger = logger.withSource(LogSource.SmartPgpProcedure);
  await produceSmartPgp({
    config,
    store,
    toolkit: await createSmartPgpToolkit({
      ...toolkitOptions,
      logger: procedureLogger,
      promptReinsert: createReinsertPrompt({
        logger: procedureLogger,
        write: writePrompt,
      }),
    }),
    logger: procedureLogger,
  });
}

/**
 * Runs the command line, resolving to the process exit code.
 */
export async function main(
  argv: readonly string[],
  options: MainOptions = {}
): Promise<number> {
  let args: CommandLineArgs | undefined;
  try {
    args = await parseCommandLineArgs(argv);
  } catch (error) {
    console.error(`❌ ${extractErrorMessage(error)}`);
    return 1;
  }
  if (!args) {
    return 0;
  }

  const logger = new Logger(LogSource.CardProductionCli, {
    verbose: args.verbose,
  });
  try {
    await runProcedure(args, logger, options);
    return 0;
  } catch (error) {
    console.error(`❌ ${extractErrorMessage(error)}`);
    await logger.log(LogEventId.ProcedureComplete, 'system', {
      message: `${args.command} failed: ${extractErrorMessage(error)}`,
      disposition: LogDispositionStandardTypes.Failure,
    });
    return 1;
  }
}

if (require.main === module) {
  void (async () => {
    process.exitCode = await main(process.argv.slice(2));
  })();
}
