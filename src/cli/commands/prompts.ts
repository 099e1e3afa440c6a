import { Command, Option } from "clipanion";
import { prepareStateDir } from "../../config/paths.js";
import { CoachingDB } from "../../store/db.js";
import { PromptStore, cancelPrompt } from "../../prompts/store.js";
import { PROMPT_STATES, type PromptState } from "../../coaching/types.js";

function parseStates(raw: string | undefined): PromptState[] | string {
  if (!raw) return [];
  const states: PromptState[] = [];
  for (const part of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
    const state = PROMPT_STATES.find((s) => s === part);
    if (!state) return part;
    states.push(state);
  }
  return states;
}

export class PromptsListCommand extends Command {
  static override paths = [["prompts", "list"]];

  static override usage = Command.Usage({
    description: "List a user's prompts, newest first",
    examples: [
      ["List all prompts for a user", "pacer prompts list --user u-123"],
      ["Only unanswered ones", "pacer prompts list --user u-123 --state delivered"],
    ],
  });

  user = Option.String("--user,-u", { required: true, description: "User id" });
  state = Option.String("--state,-s", { required: false, description: "Comma-separated states" });

  async execute(): Promise<void> {
    const states = parseStates(this.state);
    if (typeof states === "string") {
      this.context.stdout.write(`Unknown state: ${states}\n`);
      process.exitCode = 1;
      return;
    }

    const db = new CoachingDB(prepareStateDir());
    try {
      const prompts = new PromptStore(db).listForUser(this.user, states);
      if (prompts.length === 0) {
        this.context.stdout.write(`No prompts for ${this.user}.\n`);
        return;
      }

      this.context.stdout.write(`Prompts for ${this.user} (${prompts.length}):\n`);
      for (const p of prompts) {
        this.context.stdout.write(
          `  ${p.id}  [${p.state}] ${p.priority} ${p.timingType}\n` +
            `    title:   ${p.content.title}\n` +
            `    created: ${new Date(p.createdAt).toISOString()}\n` +
            `    retries: ${p.retryCount}${p.lastError ? ` (last error: ${p.lastError})` : ""}\n`,
        );
      }
    } finally {
      db.close();
    }
  }
}

export class PromptsCancelCommand extends Command {
  static override paths = [["prompts", "cancel"]];

  static override usage = Command.Usage({
    description: "Cancel a prompt that has not been answered yet",
    examples: [["Cancel a prompt", "pacer prompts cancel 5f0c..."]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<void> {
    const db = new CoachingDB(prepareStateDir());
    try {
      const cancelled = cancelPrompt(new PromptStore(db), this.id);
      if (!cancelled) {
        this.context.stdout.write(`Prompt not cancellable: ${this.id}\n`);
        process.exitCode = 1;
        return;
      }
      this.context.stdout.write(`Prompt cancelled: ${this.id} (was ${cancelled.from})\n`);
    } finally {
      db.close();
    }
  }
}
