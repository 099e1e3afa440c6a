import { Command } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, prepareStateDir } from "../../config/paths.js";
import { CoachingDB } from "../../store/db.js";
import { PromptStore } from "../../prompts/store.js";
import { PROMPT_STATES } from "../../coaching/types.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show engine configuration and prompt counts",
    examples: [["Show status", "pacer status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = prepareStateDir();

    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const out = this.context.stdout;
    out.write(`Pacer Engine Status\n`);
    out.write(`-------------------\n`);
    out.write(`Config path: ${configPath}\n`);
    out.write(`State dir:   ${stateDir}\n`);
    out.write(`Server:      ${config.server.hostname}:${config.server.port}\n`);
    out.write(`Detection:   ${config.detection.schedule}\n`);
    out.write(`Synthesis:   ${config.synthesis.endpoint ?? "(built-in templates)"}\n`);
    out.write(`Workers:     ${config.delivery.workers} (queue capacity ${config.delivery.queueCapacity})\n`);

    const sinks = ["in_app"];
    if (config.delivery.webhooks.push) sinks.push("push");
    if (config.delivery.webhooks.email) sinks.push("email");
    out.write(`Channels:    ${sinks.join(", ")}\n`);

    const db = new CoachingDB(stateDir);
    try {
      const counts = new PromptStore(db).countByState();
      out.write(`Prompts:\n`);
      for (const state of PROMPT_STATES) {
        out.write(`  ${state.padEnd(11)} ${counts[state]}\n`);
      }
    } finally {
      db.close();
    }
  }
}
