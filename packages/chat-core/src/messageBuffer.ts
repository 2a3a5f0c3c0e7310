import EventEmitter from "eventemitter3";
import type { ChatEvent, Unsubscribe } from "./types";

export const DEFAULT_FLUSH_INTERVAL_MS = 500;
export const DEFAULT_HISTORY_LIMIT = 200;

export type ChatMessageBufferOptions = {
  flushIntervalMs?: number;
  historyLimit?: number;
};

/** Streams a buffer can follow; `TwitchAdapter` provides all three. */
export type BufferSource = {
  onMessage: (handler: (message: ChatEvent) => void) => Unsubscribe;
  onDeletedMessage: (handler: (messageId: string) => void) => Unsubscribe;
  onDeletedByAuthor: (handler: (login: string) => void) => Unsubscribe;
};

type BufferEvents = {
  flush: (history: ChatEvent[]) => void;
};

/**
 * Collects incoming chat events and publishes them in batches, keeping the most
 * recent `historyLimit` events.
 */
export class ChatMessageBuffer {
  private emitter = new EventEmitter<BufferEvents>();
  private pending: ChatEvent[] = [];
  private history: ChatEvent[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly flushIntervalMs: number;
  private readonly historyLimit: number;

  constructor(options: ChatMessageBufferOptions = {}) {
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.flush(), this.flushIntervalMs);
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  push(event: ChatEvent) {
    this.pending.push(event);
  }

  /** Moves pending events into history. Returns whether anything was published. */
  flush() {
    if (!this.pending.length) return false;
    this.history = [...this.history, ...this.pending].slice(-this.historyLimit);
    this.pending = [];
    this.publish();
    return true;
  }

  getHistory() {
    return [...this.history];
  }

  getPendingCount() {
    return this.pending.length;
  }

  markDeleted(messageId: string) {
    this.markWhere((event) => event.id === messageId);
  }

  markDeletedByAuthor(login: string) {
    const target = login.toLowerCase();
    this.markWhere((event) => event.authorLogin?.toLowerCase() === target);
  }

  onFlush(handler: (history: ChatEvent[]) => void): Unsubscribe {
    this.emitter.on("flush", handler);
    return () => {
      this.emitter.off("flush", handler);
    };
  }

  /** Follows an adapter's streams until the returned function is called. */
  attach(source: BufferSource): Unsubscribe {
    const unsubscribers = [
      source.onMessage((message) => this.push(message)),
      source.onDeletedMessage((messageId) => this.markDeleted(messageId)),
      source.onDeletedByAuthor((login) => this.markDeletedByAuthor(login))
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  clear() {
    this.pending = [];
    this.history = [];
    this.publish();
  }

  private markWhere(matches: (event: ChatEvent) => boolean) {
    const mark = (event: ChatEvent): ChatEvent =>
      event.kind !== "deleted" && matches(event) ? { ...event, kind: "deleted" } : event;

    // Pending events may be deleted before they are ever flushed.
    this.pending = this.pending.map(mark);
    let changed = false;
    this.history = this.history.map((event) => {
      const next = mark(event);
      if (next !== event) changed = true;
      return next;
    });
    if (changed) this.publish();
  }

  private publish() {
    this.emitter.emit("flush", this.getHistory());
  }
}
