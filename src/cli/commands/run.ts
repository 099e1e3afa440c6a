import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };
import { startEngine } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";

export class EngineRunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the coaching engine",
    examples: [
      ["Start with default config", "pacer run"],
      ["Start with custom config", "pacer run --config ./pacer.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(pkg.version);

    try {
      await startEngine({ configPath: this.config, handleSignals: true });
      // Runs until a shutdown signal ends the process
      await new Promise<never>(() => {});
    } catch (err) {
      console.error("Failed to start engine:", err);
      process.exit(1);
    }
  }
}
