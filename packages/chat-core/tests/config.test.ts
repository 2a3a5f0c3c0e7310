import { afterEach, describe, expect, it, vi } from "vitest";
import { TWITCH_EVENTSUB_URL, TWITCH_GQL_URL, TWITCH_HELIX_URL, TWITCH_IRC_URL, loadChatConfig } from "../src/config";
import { createConsoleLogger, prefixLogger, verboseLogger } from "../src/logger";

describe("loadChatConfig", () => {
  it("falls back to the public endpoints", () => {
    expect(loadChatConfig({})).toEqual({
      ircUrl: TWITCH_IRC_URL,
      eventSubUrl: TWITCH_EVENTSUB_URL,
      helixUrl: TWITCH_HELIX_URL,
      gqlUrl: TWITCH_GQL_URL,
      verboseLogs: false
    });
  });

  it("reads credentials and overrides", () => {
    const config = loadChatConfig({
      TWITCH_CLIENT_ID: " test-client ",
      TWITCH_ACCESS_TOKEN: "oauth:test-secret",
      TWITCH_LOGIN: "MixedCase",
      TWITCH_IRC_URL: "ws://127.0.0.1:6667",
      TWITCH_EVENTSUB_URL: "",
      CHAT_VERBOSE_LOGS: "Yes"
    });
    expect(config).toMatchObject({
      clientId: "test-client",
      accessToken: "test-secret",
      login: "mixedcase",
      ircUrl: "ws://127.0.0.1:6667",
      eventSubUrl: TWITCH_EVENTSUB_URL,
      verboseLogs: true
    });
  });

  it("only enables verbose logs for truthy flags", () => {
    expect(loadChatConfig({ CHAT_VERBOSE_LOGS: "1" }).verboseLogs).toBe(true);
    expect(loadChatConfig({ CHAT_VERBOSE_LOGS: "true" }).verboseLogs).toBe(true);
    expect(loadChatConfig({ CHAT_VERBOSE_LOGS: "0" }).verboseLogs).toBe(false);
  });
});

describe("loggers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes timestamped, prefixed lines to the console", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    createConsoleLogger("irc")("Connected.");
    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0]?.[0])).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[irc\] Connected\.$/);
  });

  it("prefixes and gates messages", () => {
    const lines: string[] = [];
    const sink = (message: string) => lines.push(message);
    prefixLogger(sink, "eventsub")?.("hello");
    verboseLogger(sink, false)?.("hidden");
    verboseLogger(sink, true)?.("shown");
    expect(lines).toEqual(["[eventsub] hello", "shown"]);
    expect(prefixLogger(undefined, "x")).toBeUndefined();
  });
});
