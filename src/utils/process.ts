/**
 * Child process helper for the platform clipboard and keystroke commands
 */

import { spawn } from "node:child_process";

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Run `argv` to completion, optionally writing `input` to its stdin.
 * Rejects only when the process cannot be spawned.
 */
export const runCommand = (argv: ReadonlyArray<string>, input?: string): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const [command, ...args] = argv;
    if (command === undefined) {
      reject(new Error("No command given"));
      return;
    }

    const proc = spawn(command, args, { windowsHide: true });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    proc.on("error", reject);
    // A failed spawn also breaks stdin; the process "error" event reports it
    proc.stdin.on("error", () => undefined);
    proc.on("close", (code) => {
      resolve({
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });

    if (input !== undefined) {
      proc.stdin.write(input);
    }
    proc.stdin.end();
  });
