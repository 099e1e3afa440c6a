import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { ConfigError, loadConfig, parseConfigFile } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { PacerConfig } from "../../config/schema.js";

const REDACTED = "***REDACTED***";

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.keys(headers).map((k) => [k, REDACTED]));
}

/** Header values usually carry credentials, so only their names are shown. */
export function redactConfig(config: PacerConfig): PacerConfig {
  const { push, email } = config.delivery.webhooks;
  return {
    ...config,
    synthesis: { ...config.synthesis, headers: redactHeaders(config.synthesis.headers) },
    integrations: { ...config.integrations, headers: redactHeaders(config.integrations.headers) },
    delivery: {
      ...config.delivery,
      webhooks: {
        push: push ? { ...push, headers: redactHeaders(push.headers) } : undefined,
        email: email ? { ...email, headers: redactHeaders(email.headers) } : undefined,
      },
    },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (header values redacted)",
    examples: [["Show config", "pacer config show"]],
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "pacer config validate"],
      ["Validate specific file", "pacer config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = getConfigPath(this.configFile);

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigFile(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      const problems = err instanceof ConfigError
        ? err.problems
        : [err instanceof Error ? err.message : String(err)];
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` + problems.map((p) => `  ${p}\n`).join(""),
      );
      process.exitCode = 1;
    }
  }
}
