import { LookupCache } from "../../cache";
import type { Logger } from "../../types";
import type { BadgeImages } from "./helixClient";

export type BadgeSource = {
  getGlobalBadges: () => Promise<BadgeImages>;
  getChannelBadges: (broadcasterId: string) => Promise<BadgeImages>;
};

const GLOBAL_KEY = "global";

/** Badge images per broadcaster, with channel badges overriding global ones. */
export class BadgeCatalog {
  private readonly cache: LookupCache<BadgeImages>;
  private readonly logger?: Logger;

  constructor(source: BadgeSource, options: { logger?: Logger } = {}) {
    this.cache = new LookupCache((key) =>
      key === GLOBAL_KEY ? source.getGlobalBadges() : source.getChannelBadges(key)
    );
    this.logger = options.logger;
  }

  async loadChannel(broadcasterId: string) {
    const results = await Promise.allSettled([this.cache.load(GLOBAL_KEY), this.cache.load(broadcasterId)]);
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const scope = index === 0 ? "global" : `channel ${broadcasterId}`;
        this.logger?.(`Failed to load ${scope} badges: ${String(result.reason)}`);
      }
    });
  }

  /** Image URL for a badge set id, or undefined when neither scope knows it. */
  resolve(badge: string, broadcasterId?: string): string | undefined {
    const channel = broadcasterId ? this.cache.get(broadcasterId) : undefined;
    return channel?.[badge] ?? this.cache.get(GLOBAL_KEY)?.[badge];
  }

  invalidate(broadcasterId?: string) {
    this.cache.invalidate(broadcasterId);
  }
}
