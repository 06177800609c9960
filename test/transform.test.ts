import { describe, it, expect, beforeEach } from "vitest";
import {
  TransformChain,
  applyLength,
  formatInZone,
  parseRfc3339,
  resolveCase,
  resolveLength,
  tokenizeChain,
  transformValue,
} from "../src/query/transform.js";
import { num, str } from "../src/query/value.js";
import { logger } from "../src/observability/logger.js";

describe("transform", () => {
  let logLines: string[];

  beforeEach(() => {
    logLines = [];
    logger.setSink((line) => logLines.push(line));
  });

  describe("tokenizeChain", () => {
    it("splits letters and signed integers", () => {
      expect(tokenizeChain("u,-8,t")).toEqual([
        { type: "letter", letter: "u" },
        { type: "length", length: -8 },
        { type: "letter", letter: "t" },
      ]);
      expect(tokenizeChain("")).toEqual([]);
    });
  });

  describe("resolvers", () => {
    it("lets the last case token win", () => {
      expect(resolveCase(tokenizeChain("u,l"))).toBe("lower");
      expect(resolveCase(tokenizeChain("l,U"))).toBe("upper");
      expect(resolveCase(tokenizeChain("10"))).toBeNull();
    });

    it("lets the last length token win", () => {
      expect(resolveLength(tokenizeChain("5,u,-8"))).toBe(-8);
      expect(resolveLength(tokenizeChain("u"))).toBeNull();
    });
  });

  describe("case", () => {
    it("applies the winning case", () => {
      expect(transformValue(str("Hello"), "u,l")).toEqual(str("hello"));
      expect(transformValue(str("Hello"), "l,u")).toEqual(str("HELLO"));
    });
  });

  describe("length", () => {
    it("truncates to a prefix", () => {
      expect(transformValue(str("hello world"), "5")).toEqual(str("hello"));
      expect(transformValue(str("hi"), "5")).toEqual(str("hi"));
    });

    it("abbreviates around the middle", () => {
      expect(transformValue(str("hello world"), "-8")).toEqual(str("hel..rld"));
      expect(transformValue(str("hello world today"), "-10")).toEqual(str("hell..oday"));
      expect(transformValue(str("short"), "-10")).toEqual(str("short"));
    });

    it("keeps only the marker for tiny lengths", () => {
      expect(applyLength("abcdef", -3)).toBe("..");
      expect(applyLength("abcdef", 0)).toBe("");
    });

    it("counts code points", () => {
      expect(applyLength("añb✓cd", 4)).toBe("añb✓");
    });

    it("applies case before length", () => {
      expect(transformValue(str("Hello World"), "-8,u")).toEqual(str("HEL..RLD"));
    });
  });

  describe("timezone", () => {
    it("parses RFC 3339 timestamps only", () => {
      expect(parseRfc3339("2024-01-15T10:30:00Z")?.toISOString()).toBe("2024-01-15T10:30:00.000Z");
      expect(parseRfc3339("2024-01-15")).toBeNull();
      expect(parseRfc3339("yesterday")).toBeNull();
    });

    it("formats in the target zone with its abbreviation", () => {
      const date = new Date("2024-01-15T10:30:00Z");
      expect(formatInZone(date, "UTC")).toBe("2024-01-15T10:30:00UTC");
      expect(formatInZone(date, "America/New_York")).toBe("2024-01-15T05:30:00EST");
      expect(formatInZone(new Date("2024-01-15T00:05:00Z"), "UTC")).toBe("2024-01-15T00:05:00UTC");
      expect(formatInZone(date, "Nowhere/Special")).toBeNull();
    });

    it("converts values when a zone is given", () => {
      const value = str("2024-01-15T10:30:00.123+02:00");
      expect(transformValue(value, "t", { timezone: "UTC" })).toEqual(str("2024-01-15T08:30:00UTC"));
      expect(transformValue(value, "t")).toEqual(value);
    });

    it("stops converting a field after a parse failure", () => {
      const chain = new TransformChain("t,u");
      expect(chain.apply(str("soon"), { timezone: "UTC" })).toEqual(str("SOON"));
      expect(chain.convertsTimezone).toBe(false);
      expect(chain.apply(str("2024-01-15T10:30:00Z"), { timezone: "UTC" })).toEqual(str("2024-01-15T10:30:00Z"));
      expect(logLines.map((line) => line.slice(20))).toEqual(["E failed to parse time: soon"]);
    });
  });

  it("passes non-string values through", () => {
    expect(transformValue(num(12345), "u,2")).toEqual(num(12345));
    expect(new TransformChain("").isEmpty).toBe(true);
  });
});
