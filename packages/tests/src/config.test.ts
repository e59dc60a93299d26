import { describe, it, expect } from "vitest";
import { ConfigError, defaultGraphConfig, intArg, parseKV, resolveGraphConfig } from "@lumen/core";

describe("parseKV", () => {
  it("reads --key=value pairs and bare flags", () => {
    expect(parseKV(["--frames=3", "--verbose", "positional", "--expr=a=b"])).toEqual({
      frames: "3",
      verbose: "true",
      expr: "a=b",
    });
  });
});

describe("intArg", () => {
  it("falls back to the default when absent", () => {
    expect(intArg({}, "frames", 5)).toBe(5);
    expect(intArg({ frames: "12" }, "frames", 5)).toBe(12);
  });

  it("rejects non-integers", () => {
    expect(() => intArg({ frames: "1.5" }, "frames", 5)).toThrow(ConfigError);
  });

  it("accepts only plain decimal digits", () => {
    expect(intArg({ frames: "-2" }, "frames", 5)).toBe(-2);
    expect(() => intArg({ frames: "" }, "frames", 5)).toThrow('--frames must be an integer, got ""');
    expect(() => intArg({ frames: "1e3" }, "frames", 5)).toThrow(ConfigError);
    expect(() => intArg({ frames: " 7 " }, "frames", 5)).toThrow(ConfigError);
    expect(() => intArg({ frames: "0x10" }, "frames", 5)).toThrow(ConfigError);
  });
});

describe("resolveGraphConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveGraphConfig({})).toEqual(defaultGraphConfig);
    expect(defaultGraphConfig).toEqual({ poolMaxPerSize: 8, logLevel: "info" });
  });

  it("applies overrides", () => {
    const kv = parseKV(["--pool-max-per-size=2", "--log-level=DEBUG"]);
    expect(resolveGraphConfig(kv)).toEqual({ poolMaxPerSize: 2, logLevel: "debug" });
  });

  it("rejects invalid values", () => {
    expect(() => resolveGraphConfig({ "pool-max-per-size": "many" })).toThrow(ConfigError);
    expect(() => resolveGraphConfig({ "pool-max-per-size": "-1" })).toThrow(
      "--pool-max-per-size must be >= 0, got -1",
    );
    expect(() => resolveGraphConfig({ "log-level": "verbose" })).toThrow(
      '--log-level must be one of debug, info, warn, error, got "verbose"',
    );
  });
});
