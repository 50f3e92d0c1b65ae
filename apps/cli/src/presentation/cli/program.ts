import { Command } from "commander";
import { CliContext } from "./CliContext";
import { registerGenerateCommands } from "./commands/generate";
import { registerStudyCommands } from "./commands/studies";
import { registerInfoCommands } from "./commands/info";

export const VERSION = "0.1.0";

export function buildProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name("lectionary")
    .description("Generate structured Bible studies from scripture passages")
    .version(VERSION);

  registerGenerateCommands(program, context);
  registerStudyCommands(program, context);
  registerInfoCommands(program, context);

  return program;
}
