import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import { ToolExecutionError } from '../errors';
import { CommandResult, CommandRunner, RunCommandOptions } from './shell';

/**
 * How to reach one native tool.
 */
export interface ToolContext {
  /** Base command line, e.g. `['java', '-jar', 'gp.jar']`. */
  readonly command: readonly string[];
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly verbose: boolean;
}

function lastLine(text: string): string | undefined {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

/**
 * Base for wrappers around a native command line tool. Arguments often carry
 * keys and PINs, so they are never logged.
 */
export abstract class NativeTool {
  protected readonly logger: Logger;

  protected constructor(
    protected readonly name: string,
    protected readonly context: ToolContext
  ) {
    this.logger = context.logger;
  }

  protected verboseArgs(): string[] {
    return this.context.verbose ? ['--verbose'] : [];
  }

  /**
   * Runs the tool with `args` after the base command, returning the result
   * whatever the exit status.
   */
  protected async run(
    args: readonly string[],
    options: RunCommandOptions = {}
  ): Promise<CommandResult> {
    this.logger.debug('running %s', this.name);
    const result = await this.context.runner(
      [...this.context.command, ...args],
      options
    );
    if (result.stdout) {
      this.logger.debug('%s stdout:\n%s', this.name, result.stdout);
    }
    if (result.stderr) {
      this.logger.debug('%s stderr:\n%s', this.name, result.stderr);
    }
    await this.logger.log(LogEventId.ToolRun, 'system', {
      message: `${this.name} exited with code ${result.exitCode}`,
      disposition:
        result.exitCode === 0
          ? LogDispositionStandardTypes.Success
          : LogDispositionStandardTypes.Failure,
      tool: this.name,
      exitCode: result.exitCode,
    });
    return result;
  }

  /**
   * Like {@link run}, but a non-zero exit status throws a
   * {@link ToolExecutionError}.
   */
  protected async runChecked(
    args: readonly string[],
    options: RunCommandOptions = {}
  ): Promise<CommandResult> {
    const result = await this.run(args, options);
    if (result.exitCode !== 0) {
      throw this.failure(result);
    }
    return result;
  }

  protected failure(result: CommandResult, detail?: string): ToolExecutionError {
    return new ToolExecutionError(
      this.name,
      result.exitCode,
      detail ?? lastLine(result.stderr)
    );
  }
}
