import { Command } from "commander";
import { adjustCommand, programName } from "./commands/adjust.js";

export function createProgram(
  env: NodeJS.ProcessEnv = process.env,
  scriptPath: string | undefined = process.argv[1]
): Command {
  const program = new Command();

  program
    .name(programName(scriptPath))
    .description("Change volume or brightness and show a progress-bar notification")
    .version("0.1.0")
    .argument("<mode>", "volume|vol|v or brightness|bright|b")
    .argument("<action>", "up|u|inc|i, down|dec|d or mute|m (volume only)")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (mode: string, action: string) => {
      try {
        await adjustCommand(mode, action, env, scriptPath);
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
    });

  return program;
}
