export type ValidationCode =
  | "prompt_not_found"
  | "stale_prompt"
  | "ownership_mismatch"
  | "invalid_reply";

export class CoachingError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One user's detection pass failed. The batch carries on. */
export class DetectionError extends CoachingError {
  constructor(
    readonly userId: string,
    cause: unknown,
  ) {
    super("detection_failed", `Timing detection failed for user ${userId}: ${describe(cause)}`, { cause });
  }
}

/** Content synthesis failed or returned malformed content. Terminal for the prompt. */
export class SynthesisError extends CoachingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("synthesis_failed", message, options);
  }
}

/** One delivery attempt failed. Retried until the attempt budget runs out. */
export class DeliveryError extends CoachingError {
  constructor(
    readonly promptId: string,
    readonly channel: string,
    readonly reason: string,
    message: string,
  ) {
    super("delivery_failed", `Delivery of ${promptId} via ${channel} failed (${reason}): ${message}`);
  }
}

/** The live connection closed before the client acknowledged the prompt. */
export class ConnectionLost extends CoachingError {
  constructor(
    readonly userId: string,
    readonly promptId: string,
  ) {
    super("connection_lost", `Connection for user ${userId} closed while delivering ${promptId}`);
  }
}

export class ValidationError extends CoachingError {
  declare readonly code: ValidationCode;

  constructor(code: ValidationCode, message: string) {
    super(code, message);
  }
}

export class TimeoutError extends CoachingError {
  constructor(label: string, ms: number) {
    super("timeout", `${label} timed out after ${ms}ms`);
  }
}

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
