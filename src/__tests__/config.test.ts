import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dataLocation: undefined,
      port: 8080,
      host: "0.0.0.0",
      publicUrl: "http://127.0.0.1:8080",
      apiPrefix: "/api",
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({ RECON_DATA: "data.sqlite", PORT: "9000", API_PREFIX: "/recon/", LOG_LEVEL: "debug", HOST: "127.0.0.1" }),
    ).toEqual({
      dataLocation: "data.sqlite",
      port: 9000,
      host: "127.0.0.1",
      publicUrl: "http://127.0.0.1:9000",
      apiPrefix: "/recon",
      logLevel: "debug",
    });
  });

  it("keeps an explicit public URL", () => {
    expect(loadConfig({ PUBLIC_URL: "https://recon.example.org" }).publicUrl).toBe("https://recon.example.org");
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ PORT: "", API_PREFIX: "" })).toMatchObject({ port: 8080, apiPrefix: "/api" });
  });

  it("keeps a root prefix", () => {
    expect(loadConfig({ API_PREFIX: "/" }).apiPrefix).toBe("/");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(ConfigError);
    expect(() => loadConfig({ API_PREFIX: "api" })).toThrow(/API_PREFIX/);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
