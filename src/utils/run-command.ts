/**
 * Command runner
 * Runs an external converter with inherited stdio and reports its exit code
 */

import { spawn } from "node:child_process";

export interface RunOptions {
  cwd: string;
}

/**
 * Resolves with the exit code (null if killed by a signal); rejects only
 * when the process could not be started at all
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions,
) => Promise<number | null>;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, { cwd: options.cwd, stdio: "inherit" });
    proc.on("error", (err) => reject(err));
    proc.on("close", (code) => resolve(code));
  });

/**
 * Render a command line for display, quoting arguments that need it
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, "'\\''")}'`))
    .join(" ");
}
