import { LogSource, Logger } from '@cardprod/logging';
import { ToolContext } from '../src/tools/native_tool';
import { CommandResult, RunCommandOptions } from '../src/tools/shell';

export type MockCommandRunner = jest.Mock<
  Promise<CommandResult>,
  [readonly string[], RunCommandOptions?]
>;

/**
 * A command runner whose commands all succeed with no output unless told
 * otherwise.
 */
export function mockCommandRunner(): MockCommandRunner {
  const runner: MockCommandRunner = jest.fn();
  runner.mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' });
  return runner;
}

export function commandResult(
  result: Partial<CommandResult> = {}
): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', ...result };
}

export function makeToolContext({
  command,
  runner = mockCommandRunner(),
  verbose = false,
}: {
  command: string[];
  runner?: MockCommandRunner;
  verbose?: boolean;
}): ToolContext & { runner: MockCommandRunner } {
  return {
    command,
    runner,
    logger: new Logger(LogSource.CardProductionCli),
    verbose,
  };
}
