import { z } from "zod";
import { LookupCache } from "../../cache";
import type { ChatEmote, Emote, EmoteProvider, Logger } from "../../types";

export type ThirdPartyEmoteScanner = {
  scan: (text: string) => ChatEmote[];
};

export type EmoteSource = {
  provider: EmoteProvider;
  loadGlobal?: () => Promise<Emote[]>;
  loadChannel?: (broadcasterId: string) => Promise<Emote[]>;
};

const GLOBAL_KEY = "global";

const bttvEmoteSchema = z.object({ id: z.string(), code: z.string(), imageType: z.string().optional() });
const bttvChannelSchema = z.object({
  channelEmotes: z.array(bttvEmoteSchema).default([]),
  sharedEmotes: z.array(bttvEmoteSchema).default([])
});
const sevenTvEmoteSchema = z.object({
  id: z.string(),
  name: z.string(),
  data: z.object({
    host: z.object({
      url: z.string(),
      files: z.array(z.object({ name: z.string() }))
    })
  })
});
const sevenTvSetSchema = z.object({ emotes: z.array(sevenTvEmoteSchema).default([]) });
const sevenTvUserSchema = z.object({ emote_set: sevenTvSetSchema });
const ffzSetsSchema = z.object({
  sets: z.record(
    z.object({
      emoticons: z.array(z.object({ id: z.number(), name: z.string(), urls: z.record(z.string()) }))
    })
  )
});

const fetchJson = async (url: string): Promise<unknown> => {
  const response = await fetch(url, { headers: { Accept: "application/json" } });
  if (!response.ok) {
    throw new Error(`Emote request to ${url} failed (${response.status}).`);
  }
  return response.json();
};

const bttvEmote = (emote: z.infer<typeof bttvEmoteSchema>): Emote => ({
  id: emote.id,
  code: emote.code,
  url: `https://cdn.betterttv.net/emote/${emote.id}/2x.${emote.imageType === "gif" ? "gif" : "png"}`,
  provider: "bttv"
});

const sevenTvEmotes = (emotes: z.infer<typeof sevenTvEmoteSchema>[]): Emote[] =>
  emotes.flatMap((emote) => {
    const files = emote.data.host.files;
    const file = files.find((f) => f.name === "2x.gif") ?? files.find((f) => f.name === "2x.webp") ?? files[0];
    if (!file) return [];
    const host = emote.data.host.url.replace(/^(https?:)?\/\//, "");
    return [{ id: emote.id, code: emote.name, url: `https://${host}/${file.name}`, provider: "7tv" as const }];
  });

const ffzEmotes = (payload: z.infer<typeof ffzSetsSchema>): Emote[] =>
  Object.values(payload.sets).flatMap((set) =>
    set.emoticons.flatMap((emote) => {
      const url = Object.values(emote.urls)[0];
      if (!url) return [];
      return [{ id: String(emote.id), code: emote.name, url: url.startsWith("//") ? `https:${url}` : url, provider: "ffz" as const }];
    })
  );

export const bttvSource: EmoteSource = {
  provider: "bttv",
  loadGlobal: async () =>
    z.array(bttvEmoteSchema).parse(await fetchJson("https://api.betterttv.net/3/cached/emotes/global")).map(bttvEmote),
  loadChannel: async (broadcasterId) => {
    const payload = bttvChannelSchema.parse(
      await fetchJson(`https://api.betterttv.net/3/cached/users/twitch/${encodeURIComponent(broadcasterId)}`)
    );
    return [...payload.channelEmotes, ...payload.sharedEmotes].map(bttvEmote);
  }
};

export const sevenTvSource: EmoteSource = {
  provider: "7tv",
  loadGlobal: async () => sevenTvEmotes(sevenTvSetSchema.parse(await fetchJson("https://7tv.io/v3/emote-sets/global")).emotes),
  loadChannel: async (broadcasterId) =>
    sevenTvEmotes(
      sevenTvUserSchema.parse(await fetchJson(`https://7tv.io/v3/users/twitch/${encodeURIComponent(broadcasterId)}`)).emote_set
        .emotes
    )
};

export const ffzSource: EmoteSource = {
  provider: "ffz",
  loadGlobal: async () => ffzEmotes(ffzSetsSchema.parse(await fetchJson("https://api.frankerfacez.com/v1/set/global"))),
  loadChannel: async (broadcasterId) =>
    ffzEmotes(ffzSetsSchema.parse(await fetchJson(`https://api.frankerfacez.com/v1/room/id/${encodeURIComponent(broadcasterId)}`)))
};

export const DEFAULT_EMOTE_SOURCES: EmoteSource[] = [bttvSource, sevenTvSource, ffzSource];

/**
 * Third-party emotes (BTTV, 7TV, FFZ) for the global scope and per broadcaster.
 * Each source loads once per key and is kept until `invalidate`; one failing source
 * does not block the others and is retried on the next load.
 */
export class EmoteCatalog implements ThirdPartyEmoteScanner {
  private readonly caches: Array<{ source: EmoteSource; cache: LookupCache<Emote[]> }>;
  private readonly logger?: Logger;
  private byCode = new Map<string, Emote>();
  private activeChannel: string | null = null;

  constructor(options: { sources?: EmoteSource[]; logger?: Logger } = {}) {
    this.logger = options.logger;
    this.caches = (options.sources ?? DEFAULT_EMOTE_SOURCES).map((source) => ({
      source,
      cache: new LookupCache<Emote[]>(async (key) => {
        if (key === GLOBAL_KEY) return source.loadGlobal ? source.loadGlobal() : [];
        return source.loadChannel ? source.loadChannel(key) : [];
      })
    }));
  }

  async loadChannel(broadcasterId: string) {
    this.activeChannel = broadcasterId;
    await Promise.all(
      this.caches.flatMap(({ source, cache }) =>
        [GLOBAL_KEY, broadcasterId].map(async (key) => {
          try {
            const emotes = await cache.load(key);
            this.logger?.(`Loaded ${emotes.length} ${source.provider} emotes (${key}).`);
          } catch (error) {
            this.logger?.(`Failed to load ${source.provider} emotes (${key}): ${String(error)}`);
          }
        })
      )
    );
    this.rebuildIndex();
  }

  invalidate(broadcasterId?: string) {
    this.caches.forEach(({ cache }) => cache.invalidate(broadcasterId));
    this.rebuildIndex();
  }

  getEmotes(): Emote[] {
    return Array.from(this.byCode.values());
  }

  /** Finds every whole-word occurrence of a known code in `text`. */
  scan(text: string): ChatEmote[] {
    if (!this.byCode.size || !text) return [];
    const found: ChatEmote[] = [];
    let offset = 0;
    for (const word of text.split(" ")) {
      const emote = word ? this.byCode.get(word) : undefined;
      if (emote) {
        found.push({ ...emote, startIndex: offset, endIndex: offset + word.length - 1 });
      }
      offset += word.length + 1;
    }
    return found;
  }

  private rebuildIndex() {
    const next = new Map<string, Emote>();
    const keys = this.activeChannel ? [GLOBAL_KEY, this.activeChannel] : [GLOBAL_KEY];
    // Channel emotes override global ones with the same code.
    for (const key of keys) {
      for (const { cache } of this.caches) {
        for (const emote of cache.get(key) ?? []) {
          next.set(emote.code, emote);
        }
      }
    }
    this.byCode = next;
  }
}
