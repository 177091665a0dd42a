import { spawn } from "child_process";
import * as readline from "readline";
import { APPLY_COMMAND_TIMEOUT_MS } from "@port-provider/core";

export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  /** stdout and stderr lines in the order they were received */
  output: string;
}

export type CommandRunner = (command: readonly string[]) => Promise<CommandResult>;

/**
 * Runs a command using child_process.spawn and collects stdout and stderr into one output.
 * Rejects only when the process cannot be started.
 */
export const runCommand: CommandRunner = (command) => {
  const [cmd, ...args] = command;
  if (!cmd) {
    return Promise.reject(new Error("Cannot run an empty command"));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { timeout: APPLY_COMMAND_TIMEOUT_MS });
    const lines: string[] = [];

    if (child.stdout) {
      readline.createInterface({ input: child.stdout }).on("line", (line) => lines.push(line));
    }
    if (child.stderr) {
      readline.createInterface({ input: child.stderr }).on("line", (line) => lines.push(line));
    }

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ exitCode: code, output: lines.join("\n") });
    });
  });
};

/**
 * Indent every line of captured command output for log messages.
 */
export function formatOutput(output: string, indent: number = 4): string {
  const trimmed = output.replace(/^\n+|\n+$/g, "");
  if (!trimmed) return "";
  return trimmed
    .split("\n")
    .map((line) => `${" ".repeat(indent)}${line}\n`)
    .join("");
}
