import { z } from "zod";
import { TWITCH_GQL_URL, TWITCH_HELIX_URL } from "../../config";
import { HelixRequestError } from "../../errors";
import type { Logger } from "../../types";
import type { EventSubSubscriptionRequest, EventSubSubscriptionResponse } from "./eventSubModels";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HelixClientOptions = {
  clientId: string;
  accessToken: string;
  helixUrl?: string;
  gqlUrl?: string;
  fetch?: FetchLike;
  /** Called whenever any request answers 401. */
  onUnauthorized?: () => void;
  logger?: Logger;
};

export type TwitchUser = {
  id: string;
  login: string;
  displayName: string;
  profileImageUrl?: string;
};

/** Badge set id to image URL. */
export type BadgeImages = Record<string, string>;

const POLL_VOTE_QUERY_HASH = "968dba31919a2d89369931b753472097951c3a64b9795029ba26a9096734e064";
const CHATTERS_PAGE_SIZE = 1000;

const usersSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      login: z.string(),
      display_name: z.string(),
      profile_image_url: z.string().optional()
    })
  )
});

const chattersSchema = z.object({
  data: z.array(z.object({ user_id: z.string(), user_login: z.string(), user_name: z.string().optional() })),
  pagination: z.object({ cursor: z.string().optional() }).default({})
});

const badgesSchema = z.object({
  data: z.array(
    z.object({
      set_id: z.string(),
      versions: z.array(z.object({ id: z.string(), image_url_1x: z.string(), image_url_2x: z.string() }))
    })
  )
});

type RequestOptions = {
  method?: "GET" | "POST";
  body?: unknown;
  authorization?: string;
};

const toBadgeImages = (payload: z.infer<typeof badgesSchema>): BadgeImages => {
  const images: BadgeImages = {};
  payload.data.forEach((set) => {
    const version = set.versions[0];
    if (version) images[set.set_id] = version.image_url_2x;
  });
  return images;
};

export class HelixClient {
  private readonly clientId: string;
  private readonly accessToken: string;
  private readonly helixUrl: string;
  private readonly gqlUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly onUnauthorized?: () => void;
  private readonly logger?: Logger;

  constructor(options: HelixClientOptions) {
    this.clientId = options.clientId;
    this.accessToken = options.accessToken.replace(/^oauth:/, "");
    this.helixUrl = (options.helixUrl ?? TWITCH_HELIX_URL).replace(/\/$/, "");
    this.gqlUrl = options.gqlUrl ?? TWITCH_GQL_URL;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.onUnauthorized = options.onUnauthorized;
    this.logger = options.logger;
  }

  private async send(url: string, options: RequestOptions = {}) {
    const headers: Record<string, string> = {
      "Client-Id": this.clientId,
      Authorization: options.authorization ?? `Bearer ${this.accessToken}`
    };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";

    const response = await this.fetchImpl(url, {
      method: options.method ?? "GET",
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body)
    });
    if (response.status === 401) {
      this.logger?.(`Twitch rejected the access token for ${url}.`);
      this.onUnauthorized?.();
    }
    return response;
  }

  private async getJson<S extends z.ZodTypeAny>(source: string, url: string, schema: S): Promise<z.infer<S>> {
    const response = await this.send(url);
    const text = await response.text();
    if (!response.ok) {
      throw new HelixRequestError(source, response.status, text);
    }
    return schema.parse(JSON.parse(text));
  }

  async getCurrentUser(): Promise<TwitchUser | null> {
    const payload = await this.getJson("Twitch user lookup", `${this.helixUrl}/users`, usersSchema);
    const user = payload.data[0];
    if (!user) return null;
    return {
      id: user.id,
      login: user.login,
      displayName: user.display_name,
      profileImageUrl: user.profile_image_url
    };
  }

  /** Logins currently in chat. Requires moderator access to the channel. */
  async getChatters(broadcasterId: string, moderatorId: string): Promise<string[]> {
    const logins: string[] = [];
    let cursor: string | undefined;
    do {
      const params = new URLSearchParams({
        broadcaster_id: broadcasterId,
        moderator_id: moderatorId,
        first: String(CHATTERS_PAGE_SIZE)
      });
      if (cursor) params.set("after", cursor);
      const page = await this.getJson("Twitch chatters", `${this.helixUrl}/chat/chatters?${params}`, chattersSchema);
      page.data.forEach((chatter) => logins.push(chatter.user_login));
      cursor = page.pagination.cursor || undefined;
    } while (cursor);
    return logins;
  }

  /** Non-2xx answers are returned, not thrown; the negotiator inspects them. */
  async createEventSubSubscription(request: EventSubSubscriptionRequest): Promise<EventSubSubscriptionResponse> {
    const response = await this.send(`${this.helixUrl}/eventsub/subscriptions`, { method: "POST", body: request });
    return { status: response.status, body: await response.text() };
  }

  async getGlobalBadges(): Promise<BadgeImages> {
    return toBadgeImages(await this.getJson("Twitch global badges", `${this.helixUrl}/chat/badges/global`, badgesSchema));
  }

  async getChannelBadges(broadcasterId: string): Promise<BadgeImages> {
    const params = new URLSearchParams({ broadcaster_id: broadcasterId });
    return toBadgeImages(await this.getJson("Twitch channel badges", `${this.helixUrl}/chat/badges?${params}`, badgesSchema));
  }

  async votePoll(pollId: string, choiceId: string) {
    const response = await this.send(this.gqlUrl, {
      method: "POST",
      authorization: `OAuth ${this.accessToken}`,
      body: {
        operationName: "PollVote",
        variables: { input: { pollID: pollId, choiceID: choiceId } },
        extensions: { persistedQuery: { version: 1, sha256Hash: POLL_VOTE_QUERY_HASH } }
      }
    });
    if (!response.ok) {
      throw new HelixRequestError("Poll vote", response.status, await response.text());
    }
  }
}
