import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "warn",
      notificationErrors: "surface",
      omitNullId: false,
    });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({
        JSONRPC_LOG_LEVEL: "debug",
        JSONRPC_NOTIFICATION_ERRORS: "suppress",
        JSONRPC_OMIT_NULL_ID: "TRUE",
      }),
    ).toEqual({ logLevel: "debug", notificationErrors: "suppress", omitNullId: true });
  });

  it("accepts 1 and 0 as flags", () => {
    expect(loadConfig({ JSONRPC_OMIT_NULL_ID: "1" }).omitNullId).toBe(true);
    expect(loadConfig({ JSONRPC_OMIT_NULL_ID: "0" }).omitNullId).toBe(false);
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ JSONRPC_LOG_LEVEL: "  ", JSONRPC_OMIT_NULL_ID: "" })).toEqual({
      logLevel: "warn",
      notificationErrors: "surface",
      omitNullId: false,
    });
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { JSONRPC_LOG_LEVEL: "debug", JSONRPC_OMIT_NULL_ID: "true" },
      { logLevel: "error", omitNullId: false },
    );
    expect(config.logLevel).toBe("error");
    expect(config.omitNullId).toBe(false);
  });

  it("rejects values a setting does not accept", () => {
    expect(() => loadConfig({ JSONRPC_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid configuration: JSONRPC_LOG_LEVEL: /,
    );
    expect(() => loadConfig({ JSONRPC_OMIT_NULL_ID: "maybe" })).toThrow(/JSONRPC_OMIT_NULL_ID/);
  });
});
