import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CONFIG_FILE_NAME, Config, findConfigPath, loadConfig, parseConfig } from "../src/cli/utils/config.js";
import { ConfigError } from "../src/errors.js";
import { logger } from "../src/observability/logger.js";

describe("config", () => {
  let dir: string;
  let logLines: string[];

  beforeAll(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "tfq-config-"));
    await fs.promises.mkdir(path.join(dir, "xdg"));
    await fs.promises.mkdir(path.join(dir, "home"));
    await fs.promises.writeFile(path.join(dir, "home", CONFIG_FILE_NAME), "output: yaml\n");
    await fs.promises.writeFile(path.join(dir, "broken.yaml"), "output: [json\n");
    await fs.promises.writeFile(path.join(dir, "list.yaml"), "- json\n");
  });

  afterAll(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logLines = [];
    logger.setLevel("warn");
    logger.setSink((line) => logLines.push(line));
  });

  afterEach(() => {
    logger.setLevel("error");
  });

  describe("Config", () => {
    const config = new Config({
      output: "json",
      padding: 1,
      colors: { title: "#ff8800" },
      sq: { output: "yaml", padding: null, colors: { odd: "33" } },
    });

    it("prefers the command namespace", () => {
      expect(config.get("output", "sq")).toBe("yaml");
      expect(config.get("output", "wq")).toBe("json");
      expect(config.get("output")).toBe("json");
    });

    it("treats null as absent", () => {
      expect(config.get("padding", "sq")).toBe(1);
      expect(new Config({ output: null }).get("output")).toBeUndefined();
    });

    it("resolves dotted keys", () => {
      expect(config.getString("colors.title", "sq")).toBe("#ff8800");
      expect(config.getString("colors.odd", "sq")).toBe("33");
      expect(config.getString("colors.even", "sq")).toBeUndefined();
    });

    it("coerces typed values", () => {
      const typed = new Config({ padding: "2", width: 3.7, titles: "true", color: false, sort: 5 });
      expect(typed.getNumber("padding")).toBe(2);
      expect(typed.getNumber("width")).toBe(3);
      expect(typed.getBoolean("titles")).toBe(true);
      expect(typed.getBoolean("color")).toBe(false);
      expect(typed.getString("sort")).toBe("5");
    });

    it("warns about values of the wrong type", () => {
      const typed = new Config({ padding: "wide", color: "yes", output: ["json"] });
      expect(typed.getNumber("padding")).toBeUndefined();
      expect(typed.getBoolean("color")).toBeUndefined();
      expect(typed.getString("output")).toBeUndefined();
      expect(logLines.map((line) => line.slice(20))).toEqual([
        "W config padding: expected an integer",
        "W config color: expected true or false",
        "W config output: expected a string",
      ]);
    });
  });

  describe("parseConfig", () => {
    it("parses a YAML map", () => {
      const config = parseConfig("sq:\n  chop: true\n", "tfq.yaml");
      expect(config.getBoolean("chop", "sq")).toBe(true);
      expect(config.source).toBe("tfq.yaml");
    });

    it("treats an empty file as an empty config", () => {
      expect(parseConfig("", "tfq.yaml").get("output")).toBeUndefined();
    });

    it("rejects invalid YAML and non-map roots", () => {
      expect(() => parseConfig("output: [json\n", "tfq.yaml")).toThrow(ConfigError);
      expect(() => parseConfig("- json\n", "tfq.yaml")).toThrow("Invalid configuration file: tfq.yaml");
    });
  });

  describe("findConfigPath", () => {
    it("uses TFQ_CONFIG when set", () => {
      expect(findConfigPath({ TFQ_CONFIG: "/etc/tfq.yaml", HOME: path.join(dir, "home") })).toBe("/etc/tfq.yaml");
    });

    it("searches the config directories in order", () => {
      const env = { XDG_CONFIG_HOME: path.join(dir, "xdg"), HOME: path.join(dir, "home") };
      expect(findConfigPath(env)).toBe(path.join(dir, "home", CONFIG_FILE_NAME));
    });

    it("returns null when no file exists", () => {
      expect(findConfigPath({ HOME: path.join(dir, "xdg") })).toBeNull();
    });
  });

  describe("loadConfig", () => {
    it("loads the file found", () => {
      expect(loadConfig({ HOME: path.join(dir, "home") }).getString("output")).toBe("yaml");
    });

    it("falls back to an empty config for invalid files", () => {
      const config = loadConfig({ TFQ_CONFIG: path.join(dir, "list.yaml") });
      expect(config.get("output")).toBeUndefined();
      expect(config.source).toBeNull();
      expect(logLines).toHaveLength(1);
      expect(logLines[0]?.slice(20)).toBe(
        `E Invalid configuration file: ${path.join(dir, "list.yaml")}: top level must be a map`
      );
    });

    it("logs unreadable files", () => {
      const config = loadConfig({ TFQ_CONFIG: path.join(dir, "missing.yaml") });
      expect(config.source).toBeNull();
      expect(logLines).toHaveLength(1);
    });

    it("logs unparsable files", () => {
      loadConfig({ TFQ_CONFIG: path.join(dir, "broken.yaml") });
      expect(logLines).toHaveLength(1);
    });
  });
});
