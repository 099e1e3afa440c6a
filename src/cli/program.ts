import { Cli } from "clipanion";
import { createRequire } from "node:module";
import { EngineRunCommand } from "./commands/run.js";
import { CycleRunCommand } from "./commands/cycle.js";
import { StatusCommand } from "./commands/status.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import {
  PromptsListCommand,
  PromptsCancelCommand,
} from "./commands/prompts.js";
import { PrefsShowCommand, PrefsSetCommand } from "./commands/prefs.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Pacer",
    binaryName: "pacer",
    binaryVersion: pkg.version,
  });

  cli.register(EngineRunCommand);
  cli.register(CycleRunCommand);

  // Status
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Prompt administration
  cli.register(PromptsListCommand);
  cli.register(PromptsCancelCommand);

  // Preferences
  cli.register(PrefsShowCommand);
  cli.register(PrefsSetCommand);

  return cli;
}
