import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed either way. */
  stdin?: string;
}

/**
 * Runs a command to completion. A non-zero exit status is reported in the
 * result rather than thrown; the promise rejects only if the command could not
 * be started.
 */
export type CommandRunner = (
  command: readonly string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/**
 * Runs `command` without a shell, capturing its output.
 *
 * Sample usage:
 * const { exitCode, stdout } = await runCommand(['pkcs15-tool', '--list-certificates']);
 */
export function runCommand(
  command: readonly string[],
  { stdin }: RunCommandOptions = {}
): Promise<CommandResult> {
  const [file, ...args] = command;
  if (file === undefined) {
    return Promise.reject(new Error('Cannot run an empty command'));
  }

  return new Promise((resolve, reject) => {
    const childProcess = spawn(file, args);

    let stdout = '';
    let stderr = '';
    childProcess.stdout.setEncoding('utf-8');
    childProcess.stderr.setEncoding('utf-8');
    childProcess.stdout.on('data', (data: string) => {
      stdout += data;
    });
    childProcess.stderr.on('data', (data: string) => {
      stderr += data;
    });

    childProcess.on('error', (error) => {
      reject(new Error(`Could not run ${file}: ${error.message}`));
    });

    childProcess.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? 1,
        stdout,
        stderr: signal ? `${stderr}Terminated by ${signal}\n` : stderr,
      });
    });

    childProcess.stdin.on('error', (error) => {
      reject(new Error(`Could not write to ${file}: ${error.message}`));
    });
    childProcess.stdin.end(stdin ?? '');
  });
}
