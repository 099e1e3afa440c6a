import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { prepareStateDir } from "../../config/paths.js";
import { CoachingDB } from "../../store/db.js";
import { PreferenceStore } from "../../preferences/store.js";

const QUIET_RANGE = /^([01]\d|2[0-3]):[0-5]\d-([01]\d|2[0-3]):[0-5]\d$/;

export class PrefsShowCommand extends Command {
  static override paths = [["prefs", "show"]];

  static override usage = Command.Usage({
    description: "Show a user's effective notification preferences",
    examples: [["Show preferences", "pacer prefs show u-123"]],
  });

  user = Option.String({ name: "user", required: true });

  async execute(): Promise<void> {
    const config = loadConfig();
    const db = new CoachingDB(prepareStateDir());
    try {
      const prefs = new PreferenceStore(db, config.frequency.defaults).get(this.user);
      this.context.stdout.write(JSON.stringify(prefs, null, 2) + "\n");
    } finally {
      db.close();
    }
  }
}

export class PrefsSetCommand extends Command {
  static override paths = [["prefs", "set"]];

  static override usage = Command.Usage({
    description: "Update a user's notification preferences",
    examples: [
      ["Cap at three a day", "pacer prefs set u-123 --daily-max 3"],
      ["Quiet overnight", "pacer prefs set u-123 --quiet 22:00-07:30 --timezone Europe/Chisinau"],
      ["Turn everything off", "pacer prefs set u-123 --disable"],
    ],
  });

  user = Option.String({ name: "user", required: true });
  dailyMax = Option.String("--daily-max", { required: false, validator: t.isNumber() });
  hourlyMax = Option.String("--hourly-max", { required: false, validator: t.isNumber() });
  minInterval = Option.String("--min-interval", {
    required: false,
    validator: t.isNumber(),
    description: "Minimum minutes between deliveries",
  });
  quiet = Option.String("--quiet", { required: false, description: "HH:MM-HH:MM, or 'off'" });
  timezone = Option.String("--timezone", { required: false });
  disable = Option.Boolean("--disable", false);
  enable = Option.Boolean("--enable", false);

  async execute(): Promise<void> {
    if (this.quiet && this.quiet !== "off" && !QUIET_RANGE.test(this.quiet)) {
      this.context.stdout.write(`Invalid quiet hours: ${this.quiet} (expected HH:MM-HH:MM)\n`);
      process.exitCode = 1;
      return;
    }

    const config = loadConfig();
    const db = new CoachingDB(prepareStateDir());
    try {
      const store = new PreferenceStore(db, config.frequency.defaults);
      const current = store.get(this.user);

      let quietHours = current.quietHours;
      if (this.quiet === "off") {
        quietHours = { ...quietHours, enabled: false };
      } else if (this.quiet) {
        const [start = quietHours.start, end = quietHours.end] = this.quiet.split("-");
        quietHours = { enabled: true, start, end };
      }

      store.upsert(this.user, {
        enabled: this.disable ? false : this.enable ? true : current.enabled,
        dailyMax: this.dailyMax ?? current.dailyMax,
        hourlyMax: this.hourlyMax ?? current.hourlyMax,
        minIntervalMinutes: this.minInterval ?? current.minIntervalMinutes,
        quietHours,
        timezone: this.timezone ?? current.timezone,
        channels: current.channels,
        enabledTimingTypes: current.enabledTimingTypes,
      });
      this.context.stdout.write(`Preferences updated: ${this.user}\n`);
    } finally {
      db.close();
    }
  }
}
