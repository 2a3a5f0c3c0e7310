import EventEmitter from "eventemitter3";
import fs from "node:fs";
import path from "node:path";
import type { Logger, Unsubscribe } from "../../types";

/** NOTICE ids that only repeat what the ROOMSTATE update already says. */
export const DEFAULT_SUPPRESSED_NOTICE_IDS: readonly string[] = [
  "slow_on",
  "slow_off",
  "emote_only_on",
  "emote_only_off",
  "subs_on",
  "subs_off",
  "subscribers_on",
  "subscribers_off",
  "r9k_on",
  "r9k_off"
];

export type SuppressionStorage = {
  /** Stored ids, or null when nothing has been saved yet. */
  read: () => string[] | null;
  write: (ids: string[]) => void;
};

export class MemorySuppressionStorage implements SuppressionStorage {
  private ids: string[] | null;

  constructor(initial: string[] | null = null) {
    this.ids = initial;
  }

  read() {
    return this.ids ? [...this.ids] : null;
  }

  write(ids: string[]) {
    this.ids = [...ids];
  }
}

export class JsonFileSuppressionStorage implements SuppressionStorage {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  read(): string[] | null {
    try {
      if (!fs.existsSync(this.filePath)) return null;
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
      if (typeof parsed !== "object" || parsed === null) return null;
      const ids = "suppressedNoticeIds" in parsed ? parsed.suppressedNoticeIds : undefined;
      if (!Array.isArray(ids)) return null;
      return ids.filter((id): id is string => typeof id === "string");
    } catch {
      return null;
    }
  }

  write(ids: string[]) {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, `${JSON.stringify({ suppressedNoticeIds: ids }, null, 2)}\n`, "utf8");
  }
}

type SuppressionEvents = {
  change: (ids: string[]) => void;
};

/** The set of NOTICE msg-ids the user chose to hide. */
export class SuppressionStore {
  private readonly emitter = new EventEmitter<SuppressionEvents>();
  private readonly storage: SuppressionStorage;
  private readonly logger?: Logger;
  private ids = new Set<string>();

  constructor(options: { storage?: SuppressionStorage; logger?: Logger } = {}) {
    this.storage = options.storage ?? new MemorySuppressionStorage();
    this.logger = options.logger;
    this.reload();
  }

  reload() {
    const stored = this.storage.read()?.map((id) => id.trim()).filter(Boolean);
    this.ids = new Set(stored?.length ? stored : DEFAULT_SUPPRESSED_NOTICE_IDS);
    this.logger?.(`Loaded suppressed NOTICE ids: ${this.list().join(", ")}`);
    this.emitter.emit("change", this.list());
  }

  isSuppressed(msgId: string) {
    return this.ids.has(msgId);
  }

  list() {
    return Array.from(this.ids).sort();
  }

  replace(ids: Iterable<string>) {
    this.ids = new Set(Array.from(ids, (id) => id.trim()).filter(Boolean));
    this.persist();
  }

  toggle(msgId: string, suppressed: boolean) {
    const had = this.ids.has(msgId);
    if (had === suppressed) return;
    if (suppressed) this.ids.add(msgId);
    else this.ids.delete(msgId);
    this.persist();
  }

  onChange(handler: (ids: string[]) => void): Unsubscribe {
    this.emitter.on("change", handler);
    return () => {
      this.emitter.off("change", handler);
    };
  }

  private persist() {
    const ids = this.list();
    try {
      this.storage.write(ids);
    } catch (error) {
      this.logger?.(`Failed to save suppressed NOTICE ids: ${String(error)}`);
    }
    this.emitter.emit("change", ids);
  }
}
