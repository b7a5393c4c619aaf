import { execFile } from "child_process";
import { accessSync, constants } from "fs";
import { delimiter, join } from "path";
import { COMMAND_TIMEOUT_MS } from "@barctl/core";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs external utilities. A nonzero exit is a result, not an exception:
 * callers decide what an exit code means (pamixer --get-mute exits 1 when
 * unmuted).
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
  /** True if `command` resolves to an executable on PATH. */
  exists(command: string): boolean;
}

export class ExecFileRunner implements CommandRunner {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly stderr: NodeJS.WritableStream = process.stderr
  ) {}

  run(command: string, args: string[]): Promise<CommandResult> {
    return new Promise((resolve) => {
      execFile(
        command,
        args,
        { encoding: "utf-8", timeout: COMMAND_TIMEOUT_MS, env: this.env },
        (err, stdout, stderr) => {
          if (stderr) this.stderr.write(stderr);

          if (!err) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }

          if (err.code === "ENOENT") {
            const message = `${command}: command not found\n`;
            this.stderr.write(message);
            resolve({ stdout: "", stderr: message, exitCode: 127 });
            return;
          }

          resolve({
            stdout,
            stderr,
            exitCode: typeof err.code === "number" ? err.code : 1,
          });
        }
      );
    });
  }

  exists(command: string): boolean {
    const dirs = (this.env.PATH ?? "").split(delimiter).filter((d) => d !== "");
    for (const dir of dirs) {
      try {
        accessSync(join(dir, command), constants.X_OK);
        return true;
      } catch {
        // not in this directory
      }
    }
    return false;
  }
}

/** Process-running check backed by `pgrep -x`. */
export async function isProcessRunning(
  runner: CommandRunner,
  name: string
): Promise<boolean> {
  const { exitCode } = await runner.run("pgrep", ["-x", name]);
  return exitCode === 0;
}
