import type { ChatEmote } from "../../types";
import type { EmoteSpan } from "./emoteTag";

export const twitchEmoteUrl = (id: string) => `https://static-cdn.jtvnw.net/emoticons/v2/${id}/default/dark/1.0`;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

const sliceInclusive = (text: string, start: number, end: number) => {
  if (start < 0 || end >= text.length || start > end) return "";
  return text.slice(start, end + 1);
};

/**
 * The `emotes` tag counts code points; strings here index UTF-16 units. Spans that
 * fall outside the payload are passed through unchanged.
 */
export const toUtf16Spans = (spans: EmoteSpan[], payload: string): EmoteSpan[] => {
  const offsets = [0];
  for (const char of payload) {
    offsets.push(offsets[offsets.length - 1] + char.length);
  }
  const lastCodePoint = offsets.length - 2;

  return spans.map((span) => {
    if (span.startIndex > span.endIndex || span.endIndex > lastCodePoint) return span;
    return {
      ...span,
      startIndex: offsets[span.startIndex],
      endIndex: offsets[span.endIndex + 1] - 1
    };
  });
};

/**
 * Start of a span in the displayed text. Emote positions are computed by the server
 * against the raw payload; the displayed text may prepend a system message, strip a
 * reply mention, or differ in some other way.
 */
const translateStart = (span: EmoteSpan, originalPayload: string, finalText: string) => {
  if (originalPayload && finalText.includes(originalPayload)) {
    return finalText.indexOf(originalPayload) + span.startIndex;
  }
  if (finalText && originalPayload.includes(finalText)) {
    return span.startIndex - originalPayload.indexOf(finalText);
  }
  if (!originalPayload) return span.startIndex;

  const lastIndex = originalPayload.length - 1;
  const code = originalPayload.slice(clamp(span.startIndex, 0, lastIndex), clamp(span.endIndex, 0, lastIndex) + 1);
  if (!code) return span.startIndex;
  const found = finalText.indexOf(code);
  return found >= 0 ? found : span.startIndex;
};

/**
 * Maps emote spans from raw-payload coordinates into `finalText` coordinates.
 * A span is dropped only when no non-empty code can be recovered from either string.
 */
export const remapEmoteSpans = (spans: EmoteSpan[], originalPayload: string, finalText: string): ChatEmote[] => {
  const emotes: ChatEmote[] = [];

  for (const span of [...spans].sort((a, b) => a.startIndex - b.startIndex)) {
    const startIndex = translateStart(span, originalPayload, finalText);
    const endIndex = startIndex + (span.endIndex - span.startIndex);

    const code =
      sliceInclusive(finalText, startIndex, endIndex) ||
      sliceInclusive(originalPayload, span.startIndex, span.endIndex);
    if (!code) continue;

    emotes.push({
      id: span.id,
      code,
      url: twitchEmoteUrl(span.id),
      provider: "twitch",
      startIndex,
      endIndex
    });
  }

  return emotes;
};

export const mergeEmotes = (...sources: ChatEmote[][]): ChatEmote[] =>
  sources.flat().sort((a, b) => a.startIndex - b.startIndex);

export const isWithinText = (emote: ChatEmote, text: string) =>
  emote.startIndex >= 0 && emote.endIndex < text.length && emote.startIndex <= emote.endIndex;
