import { describe, it, expect } from "vitest";
import type { RenderOptions, Row, Value } from "../src/types/index.js";
import { DEFAULT_COLORS, cellText, colorize, renderJson, renderRows, renderTable, renderYaml } from "../src/query/render.js";
import { compileAttributes } from "../src/query/attrs.js";
import { NULL, bool, fromJson, num, str } from "../src/query/value.js";
import { RenderError } from "../src/errors.js";

const plain: RenderOptions = { output: "text", titles: false, colors: null, padding: 0 };

function sink() {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string | Uint8Array) {
      chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8"));
    },
  };
}

const specs = compileAttributes(".id,name,count");
const data: Row[] = [
  new Map([
    ["id", str("ws-1")],
    ["name", str("web")],
    ["count", num(2.5)],
  ]),
  new Map([
    ["id", str("ws-22")],
    ["name", str("")],
    ["count", num(3.5)],
  ]),
];

describe("render", () => {
  describe("cellText", () => {
    it("prints a dash for empty values", () => {
      expect(cellText(NULL)).toBe("-");
      expect(cellText(str(""))).toBe("-");
    });

    it("prints integers and rounds other numbers half to even", () => {
      expect(cellText(num(42))).toBe("42");
      expect(cellText(num(0))).toBe("0");
      expect(cellText(num(42.7))).toBe("43");
      expect(cellText(num(2.5))).toBe("2");
      expect(cellText(num(3.5))).toBe("4");
      expect(cellText(num(-2.5))).toBe("-2");
      expect(cellText(num(-0.4))).toBe("0");
    });

    it("prints booleans and collections", () => {
      expect(cellText(bool(false))).toBe("false");
      expect(cellText(bool(true))).toBe("true");
      expect(cellText(fromJson(["a", 1]))).toBe('["a",1]');
      expect(cellText(fromJson({ env: "prod" }))).toBe('{"env":"prod"}');
    });
  });

  describe("colorize", () => {
    it("emits 24-bit foreground escapes", () => {
      expect(colorize("x", "#f6be00")).toBe("\x1b[38;2;246;190;0mx\x1b[0m");
      expect(colorize("x", "#0cf", true)).toBe("\x1b[1;38;2;0;204;255mx\x1b[0m");
      expect(colorize("x", "212")).toBe("\x1b[38;5;212mx\x1b[0m");
      expect(colorize("x", "not-a-color")).toBe("x");
    });
  });

  describe("renderTable", () => {
    it("aligns columns without trailing whitespace", () => {
      expect(renderTable(data, specs, plain)).toBe("ws-1  web 2\nws-22 -   4\n");
    });

    it("adds a title row", () => {
      expect(renderTable(data, specs, { ...plain, titles: true })).toBe(
        "id    name count\nws-1  web  2\nws-22 -    4\n"
      );
    });

    it("widens the separator by the padding", () => {
      expect(renderTable(data, specs, { ...plain, padding: 2 })).toBe("ws-1    web   2\nws-22   -     4\n");
    });

    it("leaves out excluded fields", () => {
      expect(renderTable(data, compileAttributes(".id,!name,!count"), plain)).toBe("ws-1\nws-22\n");
    });

    it("colors the title and alternating rows", () => {
      const rows: Row[] = [new Map([["id", str("ws-1")]]), new Map([["id", str("ws-2")]])];
      const out = renderTable(rows, compileAttributes(".id"), { ...plain, titles: true, colors: DEFAULT_COLORS });
      expect(out.split("\n")).toEqual([
        "\x1b[1;38;2;246;190;0mid\x1b[0m",
        "\x1b[38;2;255;255;255mws-1\x1b[0m",
        "\x1b[38;2;0;200;240mws-2\x1b[0m",
        "",
      ]);
    });

    it("renders nothing for an empty dataset", () => {
      expect(renderTable([], specs, { ...plain, titles: true })).toBe("");
    });
  });

  describe("renderJson", () => {
    it("serializes included fields with two-space indent", () => {
      const out = renderJson(data.slice(0, 1), compileAttributes("!.id,name,count"));
      expect(out).toBe('[\n  {\n    "name": "web",\n    "count": 2.5\n  }\n]\n');
    });

    it("serializes an empty dataset as an empty array", () => {
      expect(renderJson([], specs)).toBe("[]\n");
    });

    it("wraps serialization failures in RenderError", () => {
      const items: Value[] = [];
      const cyclic: Value = { kind: "list", items };
      items.push(cyclic);
      const rows: Row[] = [new Map([["id", cyclic]])];
      expect(() => renderJson(rows, compileAttributes(".id"))).toThrow(RenderError);
      expect(() => renderJson(rows, compileAttributes(".id"))).toThrow("Failed to render json output");
    });
  });

  describe("renderYaml", () => {
    it("serializes included fields in order", () => {
      expect(renderYaml(data.slice(0, 1), specs)).toBe("- id: ws-1\n  name: web\n  count: 2.5\n");
    });

    it("serializes an empty dataset as an empty array", () => {
      expect(renderYaml([], specs)).toBe("[]\n");
    });
  });

  describe("renderRows", () => {
    it("writes nothing for an empty text result", () => {
      const out = sink();
      renderRows([], specs, plain, out);
      expect(out.chunks).toEqual([]);
    });

    it("writes the selected mode", () => {
      const out = sink();
      renderRows(data.slice(0, 1), compileAttributes(".id"), { ...plain, output: "json" }, out);
      expect(out.chunks.join("")).toBe('[\n  {\n    "id": "ws-1"\n  }\n]\n');
    });
  });
});
