import { describe, it, expect } from "vitest";
import { DEFAULT_PORT, loadServerConfig } from "../server/src/config.ts";
import { ConfigurationError } from "./shared/errors.ts";

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({ port: DEFAULT_PORT, defaultDepth: 2, maxDepth: 4 });
    expect(loadServerConfig({ PORT: " ", TAK_DEPTH: "" })).toEqual({ port: 8788, defaultDepth: 2, maxDepth: 4 });
  });

  it("reads the environment", () => {
    expect(loadServerConfig({ PORT: "0", TAK_DEPTH: "4" })).toEqual({ port: 0, defaultDepth: 4, maxDepth: 4 });
    expect(loadServerConfig({ PORT: "9000", TAK_DEPTH: "1" })).toEqual({ port: 9000, defaultDepth: 1, maxDepth: 4 });
  });

  it("rejects depths the service would refuse", () => {
    expect(() => loadServerConfig({ TAK_DEPTH: "abc" })).toThrow(ConfigurationError);
    expect(() => loadServerConfig({ TAK_DEPTH: "6" })).toThrow('TAK_DEPTH must be an integer between 1 and 4, got "6"');
    expect(() => loadServerConfig({ TAK_DEPTH: "0" })).toThrow(/TAK_DEPTH/);
    expect(() => loadServerConfig({ TAK_DEPTH: "2.5" })).toThrow(/TAK_DEPTH/);
  });

  it("rejects bad ports", () => {
    expect(() => loadServerConfig({ PORT: "http" })).toThrow(/PORT/);
    expect(() => loadServerConfig({ PORT: "-1" })).toThrow(ConfigurationError);
    expect(() => loadServerConfig({ PORT: "70000" })).toThrow(/PORT/);
  });
});
