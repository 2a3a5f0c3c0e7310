export type ChatAdapterStatus = "disconnected" | "connecting" | "connected" | "error";

export type ChatEventKind = "standard" | "subscription" | "raid" | "announcement" | "system" | "deleted";

export type EmoteProvider = "twitch" | "bttv" | "7tv" | "ffz";

export type Emote = {
  id: string;
  code: string;
  url: string;
  provider: EmoteProvider;
};

/** An emote located in a message; indices are inclusive and relative to `ChatEvent.text`. */
export type ChatEmote = Emote & {
  startIndex: number;
  endIndex: number;
};

export type ChatEvent = {
  id: string;
  channel: string;
  author?: string;
  authorLogin?: string;
  text: string;
  authorColor?: string;
  emotes: ChatEmote[];
  badges: string[];
  kind: ChatEventKind;
  timestamp: string;
  tags: Record<string, string>;
  replyParentId?: string;
  replyParentLogin?: string;
  replyParentBody?: string;
};

export type RoomState = {
  emoteOnly: boolean;
  /** 0 = any follower, >0 = minimum follow age in minutes, absent = off. */
  followersOnlyMinutes?: number;
  subsOnly: boolean;
  r9k: boolean;
  slowModeSeconds?: number;
};

export type PollChoice = {
  id: string;
  title: string;
  votes: number;
};

export type PollState = {
  id: string;
  title: string;
  choices: PollChoice[];
  status: string;
  durationSeconds: number;
  broadcasterId: string;
};

export type WhisperMessage = {
  id: string;
  fromUserId: string;
  fromUserLogin: string;
  fromDisplayName: string;
  toUserId: string;
  toUserLogin: string;
  text: string;
  timestamp: number;
};

export type Logger = (message: string) => void;

export type Unsubscribe = () => void;

export type ChatAdapterOptions = {
  channel: string;
  logger?: Logger;
  /** Forward per-line diagnostics to the logger as well. */
  verbose?: boolean;
};

export type ChatAdapter = {
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  sendMessage: (message: string) => Promise<void>;
  onMessage: (handler: (message: ChatEvent) => void) => Unsubscribe;
  onStatus: (handler: (status: ChatAdapterStatus) => void) => Unsubscribe;
};
