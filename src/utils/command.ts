import { execFile } from 'child_process';
import { promisify } from 'util';
import { HELPER_PROCESS_TIMEOUT_MS } from '../constants';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

/**
 * Runs a helper binary and resolves with its trimmed stdout.
 * Rejects on a non-zero exit, a missing binary (ENOENT) or the timeout.
 */
export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], {
    timeout: HELPER_PROCESS_TIMEOUT_MS,
    windowsHide: true,
    encoding: 'utf8',
  });
  return stdout.trim();
};
