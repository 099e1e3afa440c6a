import { Cron } from "croner";
import type { Logger } from "../logging/logger.js";
import { describe } from "../coaching/errors.js";

export interface ScheduledTask {
  readonly name: string;
  /** Cron pattern, seconds optional. */
  readonly schedule: string;
  run(): Promise<unknown> | unknown;
}

export interface TaskRun {
  readonly startedAt: number;
  readonly completedAt: number;
  readonly success: boolean;
  readonly error?: string;
}

export interface TaskStatus {
  readonly name: string;
  readonly schedule: string;
  readonly nextRun: string | null;
  readonly lastRun: TaskRun | null;
}

/**
 * Named periodic tasks on croner. A run still in progress when the next tick
 * fires makes that tick a no-op.
 */
export class JobScheduler {
  private readonly scheduled = new Map<string, { task: ScheduledTask; cron: Cron }>();
  private readonly lastRuns = new Map<string, TaskRun>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "scheduler" });
  }

  add(task: ScheduledTask): void {
    this.scheduled.get(task.name)?.cron.stop();

    const cron = new Cron(
      task.schedule,
      {
        protect: () => {
          this.logger.warn({ job: task.name }, "Previous run still in progress, skipping tick");
        },
      },
      () => this.execute(task),
    );
    this.scheduled.set(task.name, { task, cron });
    this.logger.debug({ job: task.name, schedule: task.schedule }, "Scheduled job");
  }

  /** Run a task immediately, outside its schedule. */
  async runNow(name: string): Promise<TaskRun | null> {
    const entry = this.scheduled.get(name);
    if (!entry) return null;
    return this.execute(entry.task);
  }

  status(): TaskStatus[] {
    return [...this.scheduled.values()].map(({ task, cron }) => ({
      name: task.name,
      schedule: task.schedule,
      nextRun: cron.nextRun()?.toISOString() ?? null,
      lastRun: this.lastRuns.get(task.name) ?? null,
    }));
  }

  stop(): void {
    for (const [name, { cron }] of this.scheduled) {
      cron.stop();
      this.logger.debug({ job: name }, "Stopped job");
    }
    this.scheduled.clear();
  }

  private async execute(task: ScheduledTask): Promise<TaskRun> {
    const startedAt = Date.now();
    let run: TaskRun;
    try {
      await task.run();
      run = { startedAt, completedAt: Date.now(), success: true };
      this.logger.debug({ job: task.name, durationMs: run.completedAt - startedAt }, "Job completed");
    } catch (err) {
      run = { startedAt, completedAt: Date.now(), success: false, error: describe(err) };
      this.logger.error({ err, job: task.name, durationMs: run.completedAt - startedAt }, "Job failed");
    }
    this.lastRuns.set(task.name, run);
    return run;
  }
}
