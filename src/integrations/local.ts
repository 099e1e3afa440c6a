import type { Logger } from "../logging/logger.js";
import type { ActivitySource, UserActivitySnapshot } from "../detection/types.js";
import type { CoachingSideEffects } from "../response/handler.js";

/** Fixed set of snapshots, for local runs without a health-record service. */
export class StaticActivitySource implements ActivitySource {
  private readonly snapshots = new Map<string, UserActivitySnapshot>();

  constructor(snapshots: readonly UserActivitySnapshot[] = []) {
    for (const s of snapshots) this.snapshots.set(s.userId, s);
  }

  set(snapshot: UserActivitySnapshot): void {
    this.snapshots.set(snapshot.userId, snapshot);
  }

  async listActiveUsers(limit: number): Promise<string[]> {
    return [...this.snapshots.keys()].slice(0, limit);
  }

  async getSnapshot(userId: string): Promise<UserActivitySnapshot> {
    const snapshot = this.snapshots.get(userId);
    if (!snapshot) throw new Error(`No activity snapshot for user ${userId}`);
    return snapshot;
  }
}

/** Logs side effects instead of performing them. */
export class LoggingSideEffects implements CoachingSideEffects {
  constructor(private readonly logger: Logger) {}

  async completeHabit(userId: string, habitId: string): Promise<void> {
    this.logger.info({ userId, habitId }, "Habit completion requested");
  }

  async skipHabitToday(userId: string, habitId: string): Promise<void> {
    this.logger.info({ userId, habitId }, "Habit skip requested");
  }

  async requestCoachSession(userId: string, promptId: string): Promise<void> {
    this.logger.info({ userId, promptId }, "Coach session requested");
  }
}
