import { Command, Option } from "clipanion";
import { startEngine } from "../../gateway/lifecycle.js";

export class CycleRunCommand extends Command {
  static override paths = [["cycle", "run"]];

  static override usage = Command.Usage({
    description: "Run one detection cycle, deliver what it produces, then exit",
    examples: [["Run a cycle now", "pacer cycle run"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const engine = await startEngine({ configPath: this.config, listen: false });
    try {
      const report = await engine.cycle.run();
      await engine.dispatcher.drain();
      this.context.stdout.write(
        `Cycle complete: ${report.users} users, ${report.timings} timings, ` +
          `${report.admitted} admitted, ${report.queued} queued, ${report.failed} failed, ` +
          `${report.duplicates} duplicates, ${report.detectionFailures} detection failures\n`,
      );
    } finally {
      await engine.shutdown();
    }
  }
}
