import { describe, expect, it } from "vitest";
import { isWithinText, mergeEmotes, remapEmoteSpans, toUtf16Spans, twitchEmoteUrl } from "../src/adapters/twitch/emoteMapper";
import { parseEmoteTag } from "../src/adapters/twitch/emoteTag";
import type { ChatEmote } from "../src/types";

describe("parseEmoteTag", () => {
  it("reads every position and sorts by start", () => {
    expect(parseEmoteTag("25:0-4,12-16/1902:6-10")).toEqual([
      { id: "25", startIndex: 0, endIndex: 4 },
      { id: "1902", startIndex: 6, endIndex: 10 },
      { id: "25", startIndex: 12, endIndex: 16 }
    ]);
  });

  it("skips malformed entries", () => {
    expect(parseEmoteTag("25:0-4,x-2,1-2-3/:1-2/bad")).toEqual([{ id: "25", startIndex: 0, endIndex: 4 }]);
  });

  it("returns nothing for an empty tag", () => {
    expect(parseEmoteTag(undefined)).toEqual([]);
    expect(parseEmoteTag("")).toEqual([]);
  });
});

describe("toUtf16Spans", () => {
  it("moves spans past astral characters", () => {
    expect(toUtf16Spans([{ id: "25", startIndex: 2, endIndex: 6 }], "\u{1F600} Kappa")).toEqual([
      { id: "25", startIndex: 3, endIndex: 7 }
    ]);
    expect(toUtf16Spans([{ id: "25", startIndex: 1, endIndex: 1 }], "a\u{1F600}b")).toEqual([
      { id: "25", startIndex: 1, endIndex: 2 }
    ]);
  });

  it("leaves spans alone in plain text or past the end", () => {
    expect(toUtf16Spans([{ id: "1", startIndex: 0, endIndex: 4 }], "hello")).toEqual([{ id: "1", startIndex: 0, endIndex: 4 }]);
    expect(toUtf16Spans([{ id: "1", startIndex: 3, endIndex: 9 }], "\u{1F600}ab")).toEqual([
      { id: "1", startIndex: 3, endIndex: 9 }
    ]);
  });
});

describe("remapEmoteSpans", () => {
  it("shifts spans past a prepended system message", () => {
    const finalText = "SYSTEM MSG\nhello world";
    const [emote] = remapEmoteSpans([{ id: "1", startIndex: 0, endIndex: 4 }], "hello world", finalText);
    expect(emote).toEqual({
      id: "1",
      code: "hello",
      url: twitchEmoteUrl("1"),
      provider: "twitch",
      startIndex: finalText.indexOf("hello world"),
      endIndex: 15
    });
    expect(emote?.startIndex).toBe(11);
  });

  it("shifts spans back when a reply mention was stripped", () => {
    const emotes = remapEmoteSpans([{ id: "9", startIndex: 8, endIndex: 12 }], "@bob hi there", "hi there");
    expect(emotes).toHaveLength(1);
    expect(emotes[0]).toMatchObject({ code: "there", startIndex: 3, endIndex: 7 });
  });

  it("keeps positions when the text is unchanged", () => {
    const emotes = remapEmoteSpans([{ id: "25", startIndex: 0, endIndex: 4 }], "Kappa hi", "Kappa hi");
    expect(emotes[0]).toMatchObject({ code: "Kappa", startIndex: 0, endIndex: 4 });
  });

  it("searches for the code when neither text contains the other", () => {
    const emotes = remapEmoteSpans([{ id: "25", startIndex: 0, endIndex: 4 }], "Kappa one", "one Kappa!");
    expect(emotes[0]).toMatchObject({ code: "Kappa", startIndex: 4, endIndex: 8 });
  });

  it("drops spans with no recoverable code", () => {
    expect(remapEmoteSpans([{ id: "25", startIndex: 5, endIndex: 9 }], "hi", "xyz")).toEqual([]);
  });
});

describe("emote helpers", () => {
  const emote = (code: string, startIndex: number): ChatEmote => ({
    id: code,
    code,
    url: `https://cdn.example/${code}`,
    provider: "bttv",
    startIndex,
    endIndex: startIndex + code.length - 1
  });

  it("merges sources by start index", () => {
    const merged = mergeEmotes([emote("b", 6)], [emote("a", 0), emote("c", 9)]);
    expect(merged.map((item) => item.code)).toEqual(["a", "b", "c"]);
  });

  it("checks spans against the text bounds", () => {
    expect(isWithinText(emote("abc", 0), "abc")).toBe(true);
    expect(isWithinText(emote("abc", 1), "abc")).toBe(false);
    expect(isWithinText(emote("abc", -1), "abc")).toBe(false);
  });
});
