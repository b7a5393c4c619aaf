import { basename, extname } from "path";
import { ArgumentError, PROGRAM_NAME, loadSettings, usage } from "@barctl/core";
import { ExecFileRunner } from "../exec.js";
import { InstanceLock, lockPathFor } from "../instance-lock.js";
import { runInvocation } from "../run.js";

/** Name of the invoked script without its extension; names the lock file. */
export function programName(scriptPath: string | undefined = process.argv[1]): string {
  if (!scriptPath) return PROGRAM_NAME;
  return basename(scriptPath, extname(scriptPath)) || PROGRAM_NAME;
}

export async function adjustCommand(
  mode: string,
  action: string,
  env: NodeJS.ProcessEnv = process.env,
  scriptPath: string | undefined = process.argv[1]
) {
  const settings = loadSettings(env);
  const name = programName(scriptPath);

  try {
    await runInvocation(mode, action, {
      settings,
      runner: new ExecFileRunner(env),
      programName: name,
      lock: new InstanceLock(lockPathFor(settings.lockDir, name), {
        timeoutMs: settings.lockTimeoutMs,
        pollMs: settings.lockPollMs,
        releaseOnExit: true,
      }),
    });
  } catch (err) {
    if (err instanceof ArgumentError) {
      console.error(`${err.message}\n${usage(name)}`);
      process.exit(1);
    }
    throw err;
  }
}
