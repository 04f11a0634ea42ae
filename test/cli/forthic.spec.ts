// test/cli/forthic.spec.ts
// Tests for the forthic command's argument handling

import { describe, it, expect } from "vitest";
import { parseCliArgs, getHelpText, getVersion, buildConfig, buildOverrides } from "../../bin/forthic-cli-lib";

describe("forthic CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version flags", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse --eval with code", () => {
      const parsed = parseCliArgs(["--eval", "1 2 +"]);
      expect(parsed.eval).toBe("1 2 +");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse file argument", () => {
      const parsed = parseCliArgs(["--verbose", "example.forthic"]);
      expect(parsed.file).toBe("example.forthic");
      expect(parsed.verbose).toBe(true);
      expect(parsed.mode).toBe("exec");
    });

    it("should default to REPL mode with no arguments", () => {
      const parsed = parseCliArgs([]);
      expect(parsed.mode).toBe("repl");
      expect(parsed.errors).toEqual([]);
    });

    it("should parse serve options", () => {
      const parsed = parseCliArgs(["serve", "--port", "0", "--host", "127.0.0.1", "--modules-config", "modules.yaml"]);
      expect(parsed.mode).toBe("serve");
      expect(parsed.port).toBe(0);
      expect(parsed.host).toBe("127.0.0.1");
      expect(parsed.modulesConfig).toBe("modules.yaml");
    });

    it("should keep serve mode when a file follows", () => {
      const parsed = parseCliArgs(["serve", "setup.forthic"]);
      expect(parsed.mode).toBe("serve");
      expect(parsed.file).toBe("setup.forthic");
    });

    it("should collect problems instead of throwing", () => {
      const parsed = parseCliArgs(["--port", "70000", "--log-level", "loud", "--nope", "--timezone"]);
      expect(parsed.errors).toEqual([
        "Invalid port: 70000",
        "Invalid log level: loud",
        "Unknown option: --nope",
        "--timezone requires a value",
      ]);
      expect(parsed.port).toBeUndefined();
    });

    it("should handle empty --eval", () => {
      expect(parseCliArgs(["--eval", ""]).eval).toBe("");
    });
  });

  describe("Help text", () => {
    it("should list every option", () => {
      const help = getHelpText();
      for (const flag of ["--help", "--version", "--eval", "--config", "--modules-config", "--port", "--host", "--timezone", "--log-level"]) {
        expect(help).toContain(flag);
      }
    });

    it("should list session commands", () => {
      const help = getHelpText();
      expect(help).toContain(".stack");
      expect(help).toContain(".quit");
    });
  });

  describe("Version display", () => {
    it("should read the package version", () => {
      expect(getVersion()).toBe("forthic-runtime v0.1.0");
    });
  });

  describe("Configuration building", () => {
    it("should turn flags into an override layer", () => {
      expect(
        buildOverrides({ port: 8080, timezone: "Europe/Paris", logLevel: "debug", modulesConfig: "m.json" })
      ).toEqual({
        server: { port: 8080 },
        interpreter: { timezone: "Europe/Paris" },
        logLevel: "debug",
        modulesConfig: "m.json",
      });
    });

    it("should leave the layer empty without flags", () => {
      expect(buildOverrides({})).toEqual({});
    });

    it("should build exec config with code", () => {
      const config = buildConfig(parseCliArgs(["-e", "[1 2 3]", "-c", "forthic.config.json"]));
      expect(config).toEqual({
        mode: "exec",
        verbose: false,
        code: "[1 2 3]",
        configFile: "forthic.config.json",
        overrides: {},
      });
    });

    it("should infer the mode when none is given", () => {
      expect(buildConfig({ file: "a.forthic" }).mode).toBe("exec");
      expect(buildConfig({}).mode).toBe("repl");
    });
  });
});
