import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import { CommandError } from '../lib/errors';

const execFile = promisify(execFileCb);

const MAX_BUFFER = 16 * 1024 * 1024;

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

function toCommandError(command: string, args: string[], err: unknown): CommandError {
  const line = [command, ...args].join(' ');
  if (!(err instanceof Error)) {
    return new CommandError(`${line} failed: ${String(err)}`, line, 1);
  }
  const code = 'code' in err ? err.code : undefined;
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
  const exitCode = typeof code === 'number' && code > 0 ? code : 1;
  const reason = stderr || (typeof code === 'string' ? code : err.message);
  return new CommandError(`${line} failed (exit ${exitCode}): ${reason}`, line, exitCode, stderr);
}

/**
 * Runs a command on the local node without a shell and collects its output.
 */
export const runCommand: CommandRunner = async (command, args) => {
  try {
    const { stdout, stderr } = await execFile(command, args, { maxBuffer: MAX_BUFFER });
    return { stdout, stderr };
  } catch (err) {
    throw toCommandError(command, args, err);
  }
};
