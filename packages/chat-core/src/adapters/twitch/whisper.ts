import { z } from "zod";
import type { WhisperMessage } from "../../types";

export type WhisperContext = {
  /** Receiving account, used when the event omits the recipient. */
  currentUser?: { id: string; login: string };
  now?: () => number;
};

type WhisperExtractor = (event: unknown, context: WhisperContext) => WhisperMessage | null;

const nestedWhisperSchema = z.object({
  whisper_id: z.string(),
  from_user_id: z.string(),
  from_user_login: z.string(),
  from_user_name: z.string(),
  to_user_id: z.string(),
  to_user_login: z.string(),
  whisper: z.object({ text: z.string() })
});

const flatWhisperSchema = nestedWhisperSchema.omit({ whisper: true }).extend({ text: z.string() });

const timestampOf = (context: WhisperContext) => (context.now ?? Date.now)();

const fromNestedShape: WhisperExtractor = (event, context) => {
  const parsed = nestedWhisperSchema.safeParse(event);
  if (!parsed.success) return null;
  const data = parsed.data;
  return {
    id: data.whisper_id,
    fromUserId: data.from_user_id,
    fromUserLogin: data.from_user_login,
    fromDisplayName: data.from_user_name || data.from_user_login,
    toUserId: data.to_user_id,
    toUserLogin: data.to_user_login,
    text: data.whisper.text,
    timestamp: timestampOf(context)
  };
};

const fromFlatShape: WhisperExtractor = (event, context) => {
  const parsed = flatWhisperSchema.safeParse(event);
  if (!parsed.success) return null;
  const data = parsed.data;
  return {
    id: data.whisper_id,
    fromUserId: data.from_user_id,
    fromUserLogin: data.from_user_login,
    fromDisplayName: data.from_user_name || data.from_user_login,
    toUserId: data.to_user_id,
    toUserLogin: data.to_user_login,
    text: data.text,
    timestamp: timestampOf(context)
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const primitiveText = (value: unknown) =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean" ? String(value) : undefined;

const pick = (record: Record<string, unknown>, keys: readonly string[]) => {
  for (const key of keys) {
    const value = primitiveText(record[key]);
    if (value !== undefined) return value;
  }
  return undefined;
};

const TEXT_KEYS = ["text", "message", "message_text", "message_body"] as const;
const NESTED_TEXT_KEYS = ["text", "body", "message"] as const;

const nestedText = (record: Record<string, unknown>) => {
  for (const key of ["message", "whisper"]) {
    const nested = record[key];
    if (!isRecord(nested)) continue;
    const text = pick(nested, NESTED_TEXT_KEYS);
    if (text) return text;
  }
  return undefined;
};

const fromTolerantKeys: WhisperExtractor = (event, context) => {
  if (!isRecord(event)) return null;
  const text = pick(event, TEXT_KEYS) || nestedText(event);
  if (!text) return null;

  const timestamp = timestampOf(context);
  const fromUserId = pick(event, ["from_user_id", "from_id", "fromId"]) ?? "";
  const fromUserLogin = pick(event, ["from_user_login", "from_login", "fromUserLogin"]) ?? "";
  const fromDisplayName = pick(event, ["from_user_name", "from_name", "display_name", "fromUserName"]) ?? fromUserLogin;
  return {
    id: pick(event, ["whisper_id", "id", "whisperId"]) ?? `${fromUserId || "whisper"}-${timestamp}`,
    fromUserId,
    fromUserLogin,
    fromDisplayName,
    toUserId: pick(event, ["to_user_id", "to_id", "toUserId"]) ?? context.currentUser?.id ?? "",
    toUserLogin: pick(event, ["to_user_login", "to_login", "toUserLogin"]) ?? context.currentUser?.login ?? "",
    text,
    timestamp
  };
};

export const WHISPER_EXTRACTORS: readonly WhisperExtractor[] = [fromNestedShape, fromFlatShape, fromTolerantKeys];

/** Decodes a `user.whisper.message` event, or null when no extractor recognises it. */
export const decodeWhisperEvent = (event: unknown, context: WhisperContext = {}): WhisperMessage | null => {
  for (const extract of WHISPER_EXTRACTORS) {
    const message = extract(event, context);
    if (message) return message;
  }
  return null;
};
