import type { ChatEvent, ChatEventKind } from "../../types";
import { resolveNoticeAuthor } from "./authorCandidates";
import type { ThirdPartyEmoteScanner } from "./emoteCatalog";
import { isWithinText, mergeEmotes, remapEmoteSpans, toUtf16Spans } from "./emoteMapper";
import { parseEmoteTag } from "./emoteTag";
import { parseIrcMessage, type IrcMessage } from "./ircParser";

export const DEFAULT_AUTHOR_COLOR = "#8A2BE2";

const SUBSCRIPTION_NOTICE_IDS = new Set([
  "sub",
  "resub",
  "subgift",
  "anonsubgift",
  "submysterygift",
  "anonsubmysterygift",
  "primepaidupgrade",
  "giftpaidupgrade"
]);

export const POLL_NOTICE_PREFIX = "channel.poll.";

export type ParseOptions = {
  emotes?: ThirdPartyEmoteScanner;
  now?: () => number;
};

export const noticeKind = (msgId: string | undefined): ChatEventKind => {
  if (msgId && SUBSCRIPTION_NOTICE_IDS.has(msgId)) return "subscription";
  if (msgId === "raid") return "raid";
  if (msgId === "announcement") return "announcement";
  return "standard";
};

export const normalizeAuthorColor = (color: string | undefined) => {
  if (!color) return DEFAULT_AUTHOR_COLOR;
  // Black is unreadable on a dark background and is what clients that never set a color end up with.
  if (color.toUpperCase() === "#000000") return "#FFFFFF";
  return color;
};

export const parseBadgeNames = (badges: string | undefined) =>
  badges
    ? badges
        .split(",")
        .map((badge) => badge.split("/")[0])
        .filter(Boolean)
    : [];

export const channelOf = (message: IrcMessage) => message.params[0]?.replace(/^#/, "") ?? "";

const timestampOf = (tags: Record<string, string>, now: () => number) => {
  const sent = Number(tags["tmi-sent-ts"]);
  return new Date(Number.isFinite(sent) && sent > 0 ? sent : now()).toISOString();
};

const eventId = (tags: Record<string, string>, timestamp: string, who: string | undefined) =>
  tags.id || `${Date.parse(timestamp)}-${who || "notice"}`;

/** Removes the `@login ` mention a client inserts when replying, so it is not shown twice. */
const stripReplyMention = (payload: string, replyLogin: string | undefined) => {
  if (!replyLogin) return payload;
  const mention = `@${replyLogin.toLowerCase()} `;
  if (!payload.toLowerCase().startsWith(mention)) return payload;
  return payload.slice(mention.length);
};

export const normalizeTwitchMessage = (message: IrcMessage, options: ParseOptions = {}): ChatEvent | null => {
  if (message.command !== "PRIVMSG" && message.command !== "USERNOTICE") return null;

  const now = options.now ?? Date.now;
  const tags = message.tags;
  const payload = message.trailing ?? "";
  const msgId = tags["msg-id"];

  let kind: ChatEventKind = "standard";
  let text: string;
  let author: string | undefined;
  let authorLogin: string | undefined;

  if (message.command === "USERNOTICE") {
    // Polls have their own state pipeline.
    if (msgId?.startsWith(POLL_NOTICE_PREFIX)) return null;

    kind = noticeKind(msgId);
    const systemText = tags["system-msg"] ?? "";
    text = systemText && payload ? `${systemText}\n${payload}` : systemText || payload;

    const resolved = resolveNoticeAuthor(tags, kind === "subscription");
    authorLogin = resolved.login;
    author = resolved.name;
  } else {
    text = "reply-parent-msg-id" in tags ? stripReplyMention(payload, tags["reply-parent-user-login"]) : payload;
    authorLogin = message.login;
    author = tags["display-name"] || message.login;
  }

  const twitchEmotes = remapEmoteSpans(toUtf16Spans(parseEmoteTag(tags.emotes), payload), payload, text);
  const thirdPartyEmotes = options.emotes?.scan(text) ?? [];
  const timestamp = timestampOf(tags, now);

  return {
    id: eventId(tags, timestamp, authorLogin),
    channel: channelOf(message),
    author,
    authorLogin,
    text,
    authorColor: normalizeAuthorColor(tags.color),
    emotes: mergeEmotes(twitchEmotes, thirdPartyEmotes).filter((emote) => isWithinText(emote, text)),
    badges: parseBadgeNames(tags.badges),
    kind,
    timestamp,
    tags,
    replyParentId: tags["reply-parent-msg-id"] || undefined,
    replyParentLogin: tags["reply-parent-user-login"] || undefined,
    replyParentBody: tags["reply-parent-msg-body"] || undefined
  };
};

/** Parses one chat-bearing protocol line. Returns null for every other line type. */
export const parseChatLine = (line: string, options: ParseOptions = {}): ChatEvent | null => {
  const message = parseIrcMessage(line);
  return message ? normalizeTwitchMessage(message, options) : null;
};

export const buildSystemEvent = (message: IrcMessage, options: ParseOptions = {}): ChatEvent => {
  const timestamp = timestampOf(message.tags, options.now ?? Date.now);
  return {
    id: eventId(message.tags, timestamp, "system"),
    channel: channelOf(message),
    text: message.trailing ?? "",
    emotes: [],
    badges: [],
    kind: "system",
    timestamp,
    tags: message.tags
  };
};

/**
 * Best-effort recovery for a PRIVMSG line the parser could not turn into an event:
 * author from the `:login!` prefix, text from everything after the channel parameter.
 */
export const salvageChatLine = (line: string, options: ParseOptions = {}): ChatEvent | null => {
  const commandIndex = line.indexOf("PRIVMSG ");
  if (commandIndex === -1) return null;

  const afterCommand = line.slice(commandIndex + "PRIVMSG ".length);
  const colonIndex = afterCommand.indexOf(":");
  const text = colonIndex === -1 ? "" : afterCommand.slice(colonIndex + 1).trim();
  if (!text) return null;

  const author = /^(?:@\S+ )?:([^!\s]+)!/.exec(line)?.[1];
  const channel = /^#?(\S+)/.exec(afterCommand)?.[1] ?? "";
  const timestamp = new Date((options.now ?? Date.now)()).toISOString();

  return {
    id: `${Date.parse(timestamp)}-${author ?? "unknown"}`,
    channel: colonIndex === 0 ? "" : channel,
    author,
    authorLogin: author,
    text,
    emotes: [],
    badges: [],
    kind: "standard",
    timestamp,
    tags: {}
  };
};
