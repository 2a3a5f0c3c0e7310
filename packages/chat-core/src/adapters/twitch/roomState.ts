import type { PollChoice, PollState, RoomState } from "../../types";

const toInt = (value: string | undefined) => {
  if (value === undefined || !/^-?\d+$/.test(value)) return undefined;
  return Number(value);
};

/** ROOMSTATE always carries the full current state, so the result replaces the previous one. */
export const parseRoomState = (tags: Record<string, string>): RoomState => {
  const followers = toInt(tags["followers-only"]);
  const slow = toInt(tags.slow);
  return {
    emoteOnly: tags["emote-only"] === "1",
    followersOnlyMinutes: followers !== undefined && followers >= 0 ? followers : undefined,
    subsOnly: tags["subs-only"] === "1" || tags.subs_only === "1",
    r9k: tags.r9k === "1",
    slowModeSeconds: slow !== undefined && slow > 0 ? slow : undefined
  };
};

export const isModeratorBadgeSet = (badges: string | undefined) =>
  (badges ?? "")
    .split(",")
    .some((badge) => badge.startsWith("moderator") || badge.startsWith("broadcaster"));

const MAX_POLL_CHOICES = 5;

export const parsePollFromTags = (tags: Record<string, string>): PollState => {
  const choices: PollChoice[] = [];
  for (let index = 1; index <= MAX_POLL_CHOICES; index += 1) {
    const id = tags[`poll-choice-${index}-id`];
    if (id === undefined) break;
    choices.push({
      id,
      title: tags[`poll-choice-${index}-title`] ?? "",
      votes: toInt(tags[`poll-choice-${index}-votes`]) ?? 0
    });
  }

  return {
    id: tags["poll-id"] ?? "",
    title: tags["poll-title"] ?? "",
    choices,
    status: tags["poll-status"]?.toUpperCase() ?? "ACTIVE",
    durationSeconds: toInt(tags["poll-duration-seconds"]) ?? 0,
    broadcasterId: tags["room-id"] ?? ""
  };
};

export const pollTotalVotes = (poll: PollState) => poll.choices.reduce((sum, choice) => sum + choice.votes, 0);

/** `begin`/`progress` notices carry the full poll; `end` clears it. Unknown ids leave the poll as is. */
export const nextPollState = (current: PollState | null, tags: Record<string, string>): PollState | null => {
  switch (tags["msg-id"]) {
    case "channel.poll.begin":
    case "channel.poll.progress":
      return parsePollFromTags(tags);
    case "channel.poll.end":
      return null;
    default:
      return current;
  }
};
