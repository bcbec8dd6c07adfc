import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { ErrorCode } from "../src/errors";
import { BridgeRuntime } from "../src/infra/runtime";
import { OWNER } from "./helpers/accounts";
import { codeOf } from "./helpers/errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      logPretty: false,
      hubDomain: 31337,
      unmappedTokenPolicy: "reject",
      relayerMaxAttempts: 20,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        BRIDGE_LOG_LEVEL: "silent",
        BRIDGE_LOG_PRETTY: "1",
        BRIDGE_HUB_DOMAIN: "100",
        BRIDGE_UNMAPPED_TOKEN_POLICY: "absorb",
        BRIDGE_RELAYER_MAX_ATTEMPTS: "3",
        UNRELATED: "ignored",
      }),
    ).toEqual({
      logLevel: "silent",
      logPretty: true,
      hubDomain: 100,
      unmappedTokenPolicy: "absorb",
      relayerMaxAttempts: 3,
    });
  });

  it("rejects invalid values", () => {
    expect(codeOf(() => loadConfig({ BRIDGE_LOG_LEVEL: "loud" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_HUB_DOMAIN: "hub" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_HUB_DOMAIN: "4294967296" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_UNMAPPED_TOKEN_POLICY: "drop" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_RELAYER_MAX_ATTEMPTS: "0" }))).toBe(ErrorCode.INVALID_ARGUMENT);
  });

  it("only takes plain decimal integers for numeric variables", () => {
    expect(codeOf(() => loadConfig({ BRIDGE_HUB_DOMAIN: "" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_HUB_DOMAIN: "1e3" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_HUB_DOMAIN: " 7" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => loadConfig({ BRIDGE_RELAYER_MAX_ATTEMPTS: "0x10" }))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(loadConfig({ BRIDGE_HUB_DOMAIN: "0" }).hubDomain).toBe(0);
  });

  it("builds a runtime from configuration", () => {
    const config = loadConfig({ BRIDGE_LOG_LEVEL: "silent", BRIDGE_HUB_DOMAIN: "500", BRIDGE_UNMAPPED_TOKEN_POLICY: "absorb" });
    const rt = BridgeRuntime.fromConfig(config, OWNER);
    expect(rt.hubDomain).toBe(500);
    expect(rt.hub.ledger.getUnmappedTokenPolicy()).toBe("absorb");
    expect(rt.hub.ledger.owner()).toBe(OWNER);
  });
});
