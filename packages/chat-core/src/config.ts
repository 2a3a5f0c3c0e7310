export const TWITCH_IRC_URL = "wss://irc-ws.chat.twitch.tv:443";
export const TWITCH_EVENTSUB_URL = "wss://eventsub.wss.twitch.tv/ws";
export const TWITCH_HELIX_URL = "https://api.twitch.tv/helix";
export const TWITCH_GQL_URL = "https://gql.twitch.tv/gql";

export type ChatConfig = {
  clientId?: string;
  accessToken?: string;
  login?: string;
  ircUrl: string;
  eventSubUrl: string;
  helixUrl: string;
  gqlUrl: string;
  verboseLogs: boolean;
};

const readString = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const readFlag = (value: string | undefined) => {
  const normalized = value?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

export const loadChatConfig = (env: NodeJS.ProcessEnv = process.env): ChatConfig => ({
  clientId: readString(env.TWITCH_CLIENT_ID),
  accessToken: readString(env.TWITCH_ACCESS_TOKEN)?.replace(/^oauth:/, ""),
  login: readString(env.TWITCH_LOGIN)?.toLowerCase(),
  ircUrl: readString(env.TWITCH_IRC_URL) ?? TWITCH_IRC_URL,
  eventSubUrl: readString(env.TWITCH_EVENTSUB_URL) ?? TWITCH_EVENTSUB_URL,
  helixUrl: readString(env.TWITCH_HELIX_URL) ?? TWITCH_HELIX_URL,
  gqlUrl: readString(env.TWITCH_GQL_URL) ?? TWITCH_GQL_URL,
  verboseLogs: readFlag(env.CHAT_VERBOSE_LOGS)
});
