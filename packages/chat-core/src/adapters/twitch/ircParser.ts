export type IrcMessage = {
  tags: Record<string, string>;
  prefix?: string;
  /** Nick part of the prefix, before any `!user@host`. */
  login?: string;
  command: string;
  params: string[];
  trailing?: string;
};

const TAG_ESCAPES: Record<string, string> = {
  s: " ",
  ":": ";",
  r: "\r",
  n: "\n",
  "\\": "\\"
};

export const unescapeTagValue = (value: string) =>
  value.replace(/\\(.?)/gs, (_match, next: string) => TAG_ESCAPES[next] ?? next);

export const parseTags = (raw: string): Record<string, string> => {
  const tags: Record<string, string> = {};
  raw.split(";").forEach((pair) => {
    const separator = pair.indexOf("=");
    const key = separator === -1 ? pair : pair.slice(0, separator);
    if (!key) return;
    tags[key] = separator === -1 ? "" : unescapeTagValue(pair.slice(separator + 1));
  });
  return tags;
};

export const parseIrcMessage = (line: string): IrcMessage | null => {
  if (!line.trim()) return null;
  let cursor = line;
  let tags: Record<string, string> = {};
  let prefix: string | undefined;

  if (cursor.startsWith("@")) {
    const spaceIndex = cursor.indexOf(" ");
    if (spaceIndex === -1) return null;
    tags = parseTags(cursor.slice(1, spaceIndex));
    cursor = cursor.slice(spaceIndex + 1);
  }

  if (cursor.startsWith(":")) {
    const spaceIndex = cursor.indexOf(" ");
    if (spaceIndex === -1) return null;
    prefix = cursor.slice(1, spaceIndex);
    cursor = cursor.slice(spaceIndex + 1);
  }

  let trailing: string | undefined;
  if (cursor.startsWith(":")) {
    // No command before the payload.
    return null;
  }
  const trailingIndex = cursor.indexOf(" :");
  if (trailingIndex !== -1) {
    trailing = cursor.slice(trailingIndex + 2);
    cursor = cursor.slice(0, trailingIndex);
  }

  const parts = cursor.split(" ").filter(Boolean);
  if (!parts.length) return null;

  const login = prefix ? prefix.split("!")[0] : undefined;

  return {
    tags,
    prefix,
    login: login || undefined,
    command: parts[0],
    params: parts.slice(1),
    trailing
  };
};
