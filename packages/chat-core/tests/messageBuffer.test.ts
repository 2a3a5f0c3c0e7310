import { afterEach, describe, expect, it, vi } from "vitest";
import { TwitchAdapter } from "../src/adapters/twitch/twitchAdapter";
import { ChatMessageBuffer } from "../src/messageBuffer";
import type { ChatEvent } from "../src/types";
import { createFakeSocketFactory } from "./fakeSocket";

const event = (id: string, authorLogin = "alice"): ChatEvent => ({
  id,
  channel: "room",
  author: authorLogin,
  authorLogin,
  text: `message ${id}`,
  emotes: [],
  badges: [],
  kind: "standard",
  timestamp: "2024-01-01T00:00:00.000Z",
  tags: {}
});

describe("ChatMessageBuffer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("publishes pushed events on the flush interval", () => {
    vi.useFakeTimers();
    const buffer = new ChatMessageBuffer();
    const flushes: string[][] = [];
    buffer.onFlush((history) => flushes.push(history.map((item) => item.id)));
    buffer.start();

    buffer.push(event("1"));
    buffer.push(event("2"));
    vi.advanceTimersByTime(499);
    expect(flushes).toEqual([]);
    expect(buffer.getPendingCount()).toBe(2);

    vi.advanceTimersByTime(1);
    expect(flushes).toEqual([["1", "2"]]);

    vi.advanceTimersByTime(500);
    expect(flushes).toHaveLength(1);

    buffer.stop();
    buffer.push(event("3"));
    vi.advanceTimersByTime(1000);
    expect(flushes).toHaveLength(1);
  });

  it("keeps only the newest events", () => {
    const buffer = new ChatMessageBuffer({ historyLimit: 3 });
    ["1", "2", "3", "4", "5"].forEach((id) => buffer.push(event(id)));
    expect(buffer.flush()).toBe(true);
    expect(buffer.getHistory().map((item) => item.id)).toEqual(["3", "4", "5"]);
    expect(buffer.flush()).toBe(false);
  });

  it("marks deleted messages and authors", () => {
    const buffer = new ChatMessageBuffer();
    buffer.push(event("1", "bob"));
    buffer.push(event("2", "alice"));
    buffer.push(event("3", "bob"));
    buffer.flush();

    buffer.markDeleted("2");
    buffer.markDeletedByAuthor("BOB");
    expect(buffer.getHistory().map((item) => item.kind)).toEqual(["deleted", "deleted", "deleted"]);
    expect(buffer.getHistory()[1]?.text).toBe("message 2");
  });

  it("applies deletions to events that are not flushed yet", () => {
    const buffer = new ChatMessageBuffer();
    const flushes: number[] = [];
    buffer.onFlush((history) => flushes.push(history.length));
    buffer.push(event("1"));
    buffer.markDeleted("1");
    expect(flushes).toEqual([]);
    buffer.flush();
    expect(buffer.getHistory()[0]?.kind).toBe("deleted");
  });

  it("follows an adapter until detached", async () => {
    const sockets = createFakeSocketFactory();
    const adapter = new TwitchAdapter({ channel: "room", createSocket: sockets.factory, autoReconnect: false });
    const buffer = new ChatMessageBuffer();
    const detach = buffer.attach(adapter);

    await adapter.connect();
    const socket = sockets.latest();
    socket.simulateOpen();
    socket.receive(
      ":tmi.twitch.tv 001 justinfan1 :Welcome",
      "@id=m1 :bob!bob@bob.tmi.twitch.tv PRIVMSG #room :first",
      "@id=m2 :carl!carl@carl.tmi.twitch.tv PRIVMSG #room :second",
      "@target-msg-id=m1 :tmi.twitch.tv CLEARMSG #room :first",
      ":tmi.twitch.tv CLEARCHAT #room :carl"
    );
    buffer.flush();
    expect(buffer.getHistory().map((item) => [item.id, item.kind])).toEqual([
      ["m1", "deleted"],
      ["m2", "deleted"]
    ]);

    detach();
    socket.receive("@id=m3 :bob!bob@bob.tmi.twitch.tv PRIVMSG #room :third");
    expect(buffer.flush()).toBe(false);
  });
});
