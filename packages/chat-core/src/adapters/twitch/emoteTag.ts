export type EmoteSpan = {
  id: string;
  startIndex: number;
  endIndex: number;
};

const parseIndex = (value: string) => (/^\d+$/.test(value) ? Number(value) : null);

/**
 * Parses the `emotes` tag, e.g. `25:0-4,12-16/1902:6-10`. Malformed entries are skipped.
 * Indices refer to the raw trailing payload of the line. Result is sorted by start index.
 */
export const parseEmoteTag = (tag: string | undefined): EmoteSpan[] => {
  if (!tag?.trim()) return [];

  const spans: EmoteSpan[] = [];
  for (const part of tag.split("/")) {
    const separator = part.indexOf(":");
    if (separator <= 0) continue;

    const id = part.slice(0, separator);
    for (const position of part.slice(separator + 1).split(",")) {
      const bounds = position.split("-");
      if (bounds.length !== 2) continue;
      const [start, end] = bounds;
      const startIndex = parseIndex(start);
      const endIndex = parseIndex(end);
      if (startIndex === null || endIndex === null) continue;
      spans.push({ id, startIndex, endIndex });
    }
  }

  return spans.sort((a, b) => a.startIndex - b.startIndex);
};
