import { describe, expect, it } from "vitest";
import { InvalidConfigurationError } from "./errors.js";
import {
  SEVERITIES,
  SEVERITY_RANK,
  Severity,
  isSeverity,
  normalizeSeverity,
  passesThreshold,
} from "./levels.js";

describe("severities", () => {
  it("are ranked DEBUG < INFO < WARN < ERROR", () => {
    expect(SEVERITIES).toEqual(["DEBUG", "INFO", "WARN", "ERROR"]);
    const ranks = SEVERITIES.map((s) => SEVERITY_RANK[s]);
    expect(ranks).toEqual([0, 1, 2, 3]);
  });

  it("exposes named constants", () => {
    expect(Severity.DEBUG).toBe("DEBUG");
    expect(Severity.ERROR).toBe("ERROR");
  });

  it("recognizes only canonical labels", () => {
    expect(isSeverity("WARN")).toBe(true);
    expect(isSeverity("warn")).toBe(false);
    expect(isSeverity("WARNING")).toBe(false);
  });
});

describe("normalizeSeverity", () => {
  it.each([
    ["debug", "DEBUG"],
    ["Info", "INFO"],
    ["wArN", "WARN"],
    ["ERROR", "ERROR"],
  ])("normalizes %s to %s", (label, expected) => {
    expect(normalizeSeverity(label)).toBe(expected);
  });

  it("rejects unknown labels with the uppercased value in the message", () => {
    expect(() => normalizeSeverity("trace")).toThrow(InvalidConfigurationError);
    expect(() => normalizeSeverity("trace")).toThrow("Invalid log level: TRACE");
  });

  it("keeps the rejected input on the error", () => {
    try {
      normalizeSeverity("verbose");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (err instanceof InvalidConfigurationError) {
        expect(err.name).toBe("InvalidConfigurationError");
        expect(err.level).toBe("verbose");
      }
    }
  });

  it("does not trim surrounding whitespace", () => {
    expect(() => normalizeSeverity(" info")).toThrow(InvalidConfigurationError);
    expect(() => normalizeSeverity("")).toThrow("Invalid log level: ");
  });
});

describe("passesThreshold", () => {
  it("keeps messages at or above the threshold", () => {
    expect(passesThreshold("WARN", "WARN")).toBe(true);
    expect(passesThreshold("ERROR", "WARN")).toBe(true);
    expect(passesThreshold("INFO", "WARN")).toBe(false);
    expect(passesThreshold("DEBUG", "DEBUG")).toBe(true);
    expect(passesThreshold("ERROR", "DEBUG")).toBe(true);
    expect(passesThreshold("WARN", "ERROR")).toBe(false);
  });
});
