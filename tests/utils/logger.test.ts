import { describe, it, expect, vi, afterEach } from "vitest";
import { log, redact, setLogLevel } from "../../src/utils/logger.js";

describe("redact", () => {
  it("shortens bearer tokens", () => {
    expect(redact("Authorization: Bearer test-secret-value")).toBe(
      "Authorization: Bearer test-sec...REDACTED",
    );
  });

  it("shortens Canvas access tokens", () => {
    expect(redact("token 1234~AbCdEfGhIjKlMnOp was rejected")).toBe(
      "token 1234~AbCd...REDACTED was rejected",
    );
  });

  it("shortens any long token-like run", () => {
    const long = "a".repeat(45);
    expect(redact(`value: ${long}`)).toBe("value: aaaaaaaa...REDACTED");
  });

  it("leaves ordinary text alone", () => {
    expect(redact("GET courses/10/modules failed")).toBe("GET courses/10/modules failed");
  });
});

describe("log", () => {
  afterEach(() => {
    setLogLevel("INFO");
  });

  it("writes redacted messages to stderr", () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});

    log("INFO", "using Bearer test-secret-value");

    expect(errorLog).toHaveBeenCalledTimes(1);
    expect(errorLog.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] using Bearer test-sec\.\.\.REDACTED$/,
    );
  });

  it("drops messages below the current level", () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("WARN");

    log("INFO", "hidden");
    log("DEBUG", "hidden");
    log("ERROR", "shown");

    expect(errorLog).toHaveBeenCalledTimes(1);
  });
});
