import { describe, expect, it, vi } from "vitest";
import { EmoteCatalog, type EmoteSource } from "../src/adapters/twitch/emoteCatalog";
import { parseChatLine } from "../src/adapters/twitch/normalize";
import type { Emote, EmoteProvider } from "../src/types";

const emote = (id: string, code: string, provider: EmoteProvider = "bttv"): Emote => ({
  id,
  code,
  url: `https://cdn.example/${id}`,
  provider
});

const setup = () => {
  const bttv = {
    provider: "bttv",
    loadGlobal: vi.fn(async () => [emote("g1", "catJAM"), emote("g2", "OMEGALUL")]),
    loadChannel: vi.fn(async (_broadcasterId: string) => [emote("c1", "catJAM"), emote("c2", "Pog")])
  } satisfies EmoteSource;
  const broken: EmoteSource = {
    provider: "7tv",
    loadGlobal: async () => {
      throw new Error("offline");
    }
  };
  const logs: string[] = [];
  const catalog = new EmoteCatalog({ sources: [bttv, broken], logger: (message) => logs.push(message) });
  return { catalog, bttv, logs };
};

describe("EmoteCatalog", () => {
  it("indexes global and channel emotes with channel overrides", async () => {
    const { catalog, logs } = setup();
    await catalog.loadChannel("10");

    expect(catalog.scan("hi catJAM  Pog")).toEqual([
      { ...emote("c1", "catJAM"), startIndex: 3, endIndex: 8 },
      { ...emote("c2", "Pog"), startIndex: 11, endIndex: 13 }
    ]);
    expect(catalog.scan("OMEGALUL")).toEqual([{ ...emote("g2", "OMEGALUL"), startIndex: 0, endIndex: 7 }]);
    expect(logs).toContain("Failed to load 7tv emotes (global): Error: offline");
    expect(logs).toContain("Loaded 0 7tv emotes (10).");
  });

  it("loads each scope once", async () => {
    const { catalog, bttv } = setup();
    await catalog.loadChannel("10");
    await catalog.loadChannel("20");
    await catalog.loadChannel("10");
    expect(bttv.loadGlobal).toHaveBeenCalledTimes(1);
    expect(bttv.loadChannel).toHaveBeenCalledTimes(2);
  });

  it("drops channel emotes on invalidate", async () => {
    const { catalog } = setup();
    await catalog.loadChannel("10");
    catalog.invalidate("10");
    expect(catalog.scan("catJAM Pog")).toEqual([{ ...emote("g1", "catJAM"), startIndex: 0, endIndex: 5 }]);
  });

  it("matches whole words only", async () => {
    const { catalog } = setup();
    await catalog.loadChannel("10");
    expect(catalog.scan("catJAMs Poggers")).toEqual([]);
    expect(catalog.getEmotes().map((item) => item.code).sort()).toEqual(["OMEGALUL", "Pog", "catJAM"]);
  });

  it("decorates parsed chat lines", async () => {
    const { catalog } = setup();
    await catalog.loadChannel("10");
    const event = parseChatLine(":a!a@a PRIVMSG #room :hi catJAM", { emotes: catalog });
    expect(event?.emotes).toEqual([{ ...emote("c1", "catJAM"), startIndex: 3, endIndex: 8 }]);
  });
});
