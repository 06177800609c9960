import { describe, it, expect } from "vitest";
import { isHungarian } from "../src/query/hungarian.js";

describe("isHungarian", () => {
  it("matches a type token used as a name token", () => {
    expect(isHungarian("aws_s3_bucket", "logs_bucket")).toBe(true);
    expect(isHungarian("google_compute_instance", "web-instance")).toBe(true);
  });

  it("matches a type token inside a name without separators", () => {
    expect(isHungarian("aws_s3_bucket", "mybucket")).toBe(true);
  });

  it("rejects names free of type tokens", () => {
    expect(isHungarian("aws_instance", "web")).toBe(false);
    expect(isHungarian("aws_s3_bucket", "logs")).toBe(false);
  });

  it("is case insensitive", () => {
    expect(isHungarian("aws_s3_bucket", "LogsBucket")).toBe(true);
  });

  it("rejects empty inputs", () => {
    expect(isHungarian("", "web")).toBe(false);
    expect(isHungarian("aws_instance", "")).toBe(false);
  });
});
