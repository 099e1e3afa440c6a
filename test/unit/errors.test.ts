import { describe as suite, it, expect } from "vitest";
import {
  CoachingError,
  ConnectionLost,
  DeliveryError,
  DetectionError,
  ValidationError,
  describe,
} from "../../src/coaching/errors.js";

suite("coaching errors", () => {
  it("carry a stable code and their own class name", () => {
    const err = new DeliveryError("p-1", "push", "sink_error", "HTTP 502 Bad Gateway");
    expect(err).toBeInstanceOf(CoachingError);
    expect(err.name).toBe("DeliveryError");
    expect(err.code).toBe("delivery_failed");
    expect(err.message).toBe("Delivery of p-1 via push failed (sink_error): HTTP 502 Bad Gateway");
  });

  it("describe the lost connection", () => {
    const err = new ConnectionLost("user-1", "p-1");
    expect(err.code).toBe("connection_lost");
    expect(err.message).toBe("Connection for user user-1 closed while delivering p-1");
  });

  it("wrap a detection failure with its cause", () => {
    const cause = new Error("snapshot unavailable");
    const err = new DetectionError("user-1", cause);
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Timing detection failed for user user-1: snapshot unavailable");
  });

  it("keep the validation code", () => {
    expect(new ValidationError("stale_prompt", "Prompt p-1 is responded").code).toBe("stale_prompt");
    expect(describe("plain")).toBe("plain");
  });
});
