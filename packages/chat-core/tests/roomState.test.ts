import { describe, expect, it } from "vitest";
import {
  isModeratorBadgeSet,
  nextPollState,
  parsePollFromTags,
  parseRoomState,
  pollTotalVotes
} from "../src/adapters/twitch/roomState";

describe("parseRoomState", () => {
  it("treats disabled modes as absent", () => {
    expect(
      parseRoomState({ "emote-only": "1", "followers-only": "-1", r9k: "0", slow: "0", "subs-only": "1" })
    ).toEqual({ emoteOnly: true, subsOnly: true, r9k: false });
  });

  it("reads follower and slow mode durations", () => {
    const state = parseRoomState({ "followers-only": "10", slow: "30", r9k: "1" });
    expect(state.followersOnlyMinutes).toBe(10);
    expect(state.slowModeSeconds).toBe(30);
    expect(state.r9k).toBe(true);
  });

  it("keeps zero-minute followers-only mode", () => {
    expect(parseRoomState({ "followers-only": "0" }).followersOnlyMinutes).toBe(0);
  });

  it("accepts the underscore subs-only spelling", () => {
    expect(parseRoomState({ subs_only: "1" }).subsOnly).toBe(true);
  });
});

describe("isModeratorBadgeSet", () => {
  it("recognises moderators and broadcasters", () => {
    expect(isModeratorBadgeSet("moderator/1,subscriber/0")).toBe(true);
    expect(isModeratorBadgeSet("broadcaster/1")).toBe(true);
    expect(isModeratorBadgeSet("subscriber/3")).toBe(false);
    expect(isModeratorBadgeSet(undefined)).toBe(false);
  });
});

describe("polls", () => {
  const begin = {
    "msg-id": "channel.poll.begin",
    "poll-id": "p1",
    "poll-title": "Best snack?",
    "poll-choice-1-id": "c1",
    "poll-choice-1-title": "Chips",
    "poll-choice-1-votes": "3",
    "poll-choice-2-id": "c2",
    "poll-choice-2-title": "Fruit",
    "poll-choice-2-votes": "4",
    "poll-choice-4-id": "skipped",
    "poll-duration-seconds": "120",
    "room-id": "42"
  };

  it("parses choices until the first gap", () => {
    const poll = parsePollFromTags(begin);
    expect(poll).toEqual({
      id: "p1",
      title: "Best snack?",
      choices: [
        { id: "c1", title: "Chips", votes: 3 },
        { id: "c2", title: "Fruit", votes: 4 }
      ],
      status: "ACTIVE",
      durationSeconds: 120,
      broadcasterId: "42"
    });
    expect(pollTotalVotes(poll)).toBe(7);
  });

  it("moves through begin, progress and end", () => {
    const started = nextPollState(null, begin);
    expect(started?.id).toBe("p1");

    const progressed = nextPollState(started, { ...begin, "msg-id": "channel.poll.progress", "poll-status": "active", "poll-choice-1-votes": "9" });
    expect(progressed?.choices[0]?.votes).toBe(9);
    expect(progressed?.status).toBe("ACTIVE");

    expect(nextPollState(progressed, { "msg-id": "channel.poll.unknown" })).toBe(progressed);
    expect(nextPollState(progressed, { "msg-id": "channel.poll.end" })).toBeNull();
  });
});
