export * from "./types";
export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./socket";
export * from "./cache";
export * from "./messageBuffer";
export * from "./adapters/twitch/twitchAdapter";
export * from "./adapters/twitch/eventSubAdapter";
export * from "./adapters/twitch/eventSubModels";
export * from "./adapters/twitch/keepalive";
export * from "./adapters/twitch/subscriptionNegotiator";
export * from "./adapters/twitch/whisper";
export * from "./adapters/twitch/helixClient";
export * from "./adapters/twitch/badgeCatalog";
export * from "./adapters/twitch/emoteCatalog";
export * from "./adapters/twitch/emoteMapper";
export * from "./adapters/twitch/emoteTag";
export * from "./adapters/twitch/ircParser";
export * from "./adapters/twitch/normalize";
export * from "./adapters/twitch/roomState";
export * from "./adapters/twitch/suppression";
export * from "./adapters/twitch/authorCandidates";
