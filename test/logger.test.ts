import { describe, expect, it } from "vitest";
import { formatLine, redact } from "../src/logger.js";

describe("redact", () => {
  it("replaces password fields at any depth", () => {
    expect(redact({ on: "true", password: "1234" })).toEqual({ on: "true", password: "[REDACTED]" });
    expect(redact({ outer: [{ password: "test-secret", keep: 1 }] })).toEqual({ outer: [{ password: "[REDACTED]", keep: 1 }] });
  });

  it("leaves the original untouched", () => {
    const body = { password: "test-secret" };
    redact(body);
    expect(body.password).toBe("test-secret");
  });
});

describe("formatLine", () => {
  const now = new Date("2017-10-23T13:48:30.148Z");

  it("appends metadata as JSON and drops undefined values", () => {
    expect(formatLine("info", "Vehicle command rejected", { command: "door_lock", reason: undefined }, now)).toBe(
      '2017-10-23T13:48:30.148Z [INFO] Vehicle command rejected {"command":"door_lock"}'
    );
  });

  it("omits empty metadata", () => {
    expect(formatLine("warn", "hello", {}, now)).toBe("2017-10-23T13:48:30.148Z [WARN] hello");
  });
});
