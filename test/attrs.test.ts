import { describe, it, expect, beforeEach } from "vitest";
import {
  AttributeListBuilder,
  buildAttributes,
  compileAttributes,
  formatAttributes,
  mergeGlobal,
  qualifyKey,
} from "../src/query/attrs.js";
import { logger } from "../src/observability/logger.js";

describe("attrs", () => {
  let logLines: string[];

  beforeEach(() => {
    logLines = [];
    logger.setSink((line) => logLines.push(line));
  });

  describe("qualifyKey", () => {
    it("qualifies keys under attributes unless rooted", () => {
      expect(qualifyKey("name")).toBe("attributes.name");
      expect(qualifyKey(".id")).toBe("id");
      expect(qualifyKey("*")).toBe("*");
    });
  });

  describe("compileAttributes", () => {
    it("defaults the output key to the last segment", () => {
      expect(compileAttributes("tags.env,.relationships.project.data.id")).toEqual([
        { sourceKey: "attributes.tags.env", outputKey: "env", include: true, transformChain: "" },
        { sourceKey: "relationships.project.data.id", outputKey: "id", include: true, transformChain: "" },
      ]);
    });

    it("treats an empty output key like a missing one", () => {
      expect(compileAttributes("name:")[0]?.outputKey).toBe("name");
      expect(compileAttributes("name::u")[0]).toEqual({
        sourceKey: "attributes.name",
        outputKey: "name",
        include: true,
        transformChain: "u",
      });
    });

    it("parses exclusion and renames", () => {
      expect(compileAttributes("!.mode,created-at:date:t")).toEqual([
        { sourceKey: "mode", outputKey: "mode", include: false, transformChain: "" },
        { sourceKey: "attributes.created-at", outputKey: "date", include: true, transformChain: "t" },
      ]);
    });

    it("never includes the wildcard", () => {
      expect(compileAttributes("*:x:u")[0]).toEqual({
        sourceKey: "*",
        outputKey: "x",
        include: false,
        transformChain: "u",
      });
    });

    it("is idempotent under re-specification", () => {
      const first = compileAttributes("name");
      const second = compileAttributes("name::u", first);
      expect(second).toEqual([
        { sourceKey: "attributes.name", outputKey: "name", include: true, transformChain: "u" },
      ]);
      expect(first[0]?.transformChain).toBe("");
    });

    it("upserts by output key", () => {
      const specs = compileAttributes("id::u", compileAttributes("external-id:id,.id:name"));
      expect(specs).toEqual([
        { sourceKey: "attributes.external-id", outputKey: "id", include: true, transformChain: "u" },
        { sourceKey: "id", outputKey: "name", include: true, transformChain: "" },
      ]);
    });

    it("upserts a rooted key given in qualified form", () => {
      const specs = compileAttributes("!id", compileAttributes(".id"));
      expect(specs).toEqual([{ sourceKey: "id", outputKey: "id", include: false, transformChain: "" }]);
    });

    it("skips empty and malformed entries", () => {
      expect(compileAttributes("name,,:x, ").map((spec) => spec.sourceKey)).toEqual(["attributes.name"]);
      expect(logLines).toHaveLength(1);
      expect(logLines[0]?.slice(20)).toBe("E invalid attribute: :x");
    });

    it("ignores a bare wildcard", () => {
      expect(compileAttributes("*")).toEqual([]);
    });
  });

  describe("mergeGlobal", () => {
    it("prepends the wildcard chain to every entry", () => {
      const merged = mergeGlobal(compileAttributes(".id,name::-8,*::u"));
      expect(merged.map((spec) => spec.transformChain)).toEqual(["u,", "u,-8", "u,u"]);
    });

    it("returns copies when there is no global chain", () => {
      const specs = compileAttributes("name::l");
      const merged = mergeGlobal(specs);
      expect(merged).toEqual(specs);
      expect(merged[0]).not.toBe(specs[0]);
    });
  });

  it("buildAttributes layers defaults, user spec and global chain", () => {
    const specs = buildAttributes(["!.mode", "!.type", ".resource", "id", "name"], "name::u,*::10");
    expect(formatAttributes(specs)).toBe(
      "mode:mode:10,,type:type:10,,resource:resource:10,,attributes.id:id:10,,attributes.name:name:10,u,*:*:10,10"
    );
  });

  it("AttributeListBuilder builds independent lists", () => {
    const builder = new AttributeListBuilder().add(".id").add("name");
    const [head] = builder.build();
    if (head) head.outputKey = "changed";
    expect(builder.build()[0]?.outputKey).toBe("id");
  });
});
