import EventEmitter from "eventemitter3";
import { TWITCH_IRC_URL } from "../../config";
import { ChatConnectionError } from "../../errors";
import { verboseLogger } from "../../logger";
import { createWebSocket, type ChatSocket, type SocketFactory } from "../../socket";
import type {
  ChatAdapter,
  ChatAdapterOptions,
  ChatAdapterStatus,
  ChatEvent,
  Logger,
  PollState,
  RoomState,
  Unsubscribe
} from "../../types";
import type { ThirdPartyEmoteScanner } from "./emoteCatalog";
import { parseIrcMessage, type IrcMessage } from "./ircParser";
import {
  POLL_NOTICE_PREFIX,
  buildSystemEvent,
  normalizeAuthorColor,
  normalizeTwitchMessage,
  salvageChatLine
} from "./normalize";
import { isModeratorBadgeSet, nextPollState, parseRoomState } from "./roomState";
import { SuppressionStore } from "./suppression";

export type TwitchAuth = {
  token?: string;
  username?: string;
};

export type TwitchAdapterOptions = ChatAdapterOptions & {
  auth?: TwitchAuth;
  url?: string;
  suppression?: SuppressionStore;
  emotes?: ThirdPartyEmoteScanner;
  votePoll?: (pollId: string, choiceId: string) => Promise<void>;
  createSocket?: SocketFactory;
  /**
   * Reopen the socket with backoff after an unexpected close. Defaults to true; pass
   * false to leave retries to the caller, which then sees the `error`/`disconnected`
   * status and calls `connect()` itself.
   */
  autoReconnect?: boolean;
};

export type SendMessageOptions = {
  replyTo?: string;
};

type TwitchAdapterEvents = {
  message: (message: ChatEvent) => void;
  status: (status: ChatAdapterStatus) => void;
  deletedMessage: (messageId: string) => void;
  deletedByAuthor: (login: string) => void;
  roomState: (state: RoomState | null) => void;
  chatters: (chatters: string[]) => void;
  moderator: (isModerator: boolean) => void;
  poll: (poll: PollState | null) => void;
};

const MAX_MESSAGE_LENGTH = 500;

/** Logins and message ids are single IRC tokens; anything with whitespace would split the line. */
const requireToken = (value: string, label: string) => {
  const token = value.trim();
  if (!token || /\s/.test(token)) {
    throw new ChatConnectionError(`Invalid ${label}.`);
  }
  return token;
};
const DEFAULT_TIMEOUT_SECONDS = 600;

const normalizeChannel = (channel: string) => channel.trim().replace(/^#/, "").toLowerCase();

export class TwitchAdapter implements ChatAdapter {
  private emitter = new EventEmitter<TwitchAdapterEvents>();
  private socket: ChatSocket | null = null;
  private status: ChatAdapterStatus = "disconnected";
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private session = 0;
  private channel: string;
  private readonly auth: TwitchAuth;
  private readonly url: string;
  private readonly logger?: Logger;
  private readonly debug?: Logger;
  private readonly suppression: SuppressionStore;
  private readonly emotes?: ThirdPartyEmoteScanner;
  private readonly votePollRequest?: (pollId: string, choiceId: string) => Promise<void>;
  private readonly createSocket: SocketFactory;
  private readonly autoReconnect: boolean;
  private chatters = new Set<string>();
  private roomState: RoomState | null = null;
  private moderator = false;
  private poll: PollState | null = null;

  constructor(options: TwitchAdapterOptions) {
    this.channel = normalizeChannel(options.channel);
    this.auth = options.auth ?? {};
    this.url = options.url ?? TWITCH_IRC_URL;
    this.logger = options.logger;
    this.debug = verboseLogger(options.logger, options.verbose);
    this.suppression = options.suppression ?? new SuppressionStore();
    this.emotes = options.emotes;
    this.votePollRequest = options.votePoll;
    this.createSocket = options.createSocket ?? createWebSocket;
    this.autoReconnect = options.autoReconnect ?? true;
  }

  onMessage(handler: (message: ChatEvent) => void) {
    return this.subscribe("message", handler);
  }

  onStatus(handler: (status: ChatAdapterStatus) => void) {
    return this.subscribe("status", handler);
  }

  onDeletedMessage(handler: (messageId: string) => void) {
    return this.subscribe("deletedMessage", handler);
  }

  onDeletedByAuthor(handler: (login: string) => void) {
    return this.subscribe("deletedByAuthor", handler);
  }

  onRoomState(handler: (state: RoomState | null) => void) {
    return this.subscribe("roomState", handler);
  }

  onChatters(handler: (chatters: string[]) => void) {
    return this.subscribe("chatters", handler);
  }

  onModerator(handler: (isModerator: boolean) => void) {
    return this.subscribe("moderator", handler);
  }

  onPoll(handler: (poll: PollState | null) => void) {
    return this.subscribe("poll", handler);
  }

  getStatus() {
    return this.status;
  }

  getChannel() {
    return this.channel;
  }

  getRoomState() {
    return this.roomState;
  }

  getChatters() {
    return Array.from(this.chatters).sort();
  }

  isModerator() {
    return this.moderator;
  }

  getPoll() {
    return this.poll;
  }

  private subscribe<K extends keyof TwitchAdapterEvents>(
    event: K,
    handler: EventEmitter.EventListener<TwitchAdapterEvents, K>
  ): Unsubscribe {
    this.emitter.on(event, handler);
    return () => {
      this.emitter.off(event, handler);
    };
  }

  private setStatus(status: ChatAdapterStatus) {
    if (this.status === status) return;
    this.status = status;
    this.emitter.emit("status", status);
  }

  /** Connects to `channel` (or the configured one). No-op while connecting or connected. */
  async connect(channel?: string) {
    if (this.status === "connecting" || this.status === "connected") return;
    if (channel) this.channel = normalizeChannel(channel);
    this.session += 1;
    this.reconnectAttempts = 0;
    this.clearReconnectTimer();
    this.setRoomState(null);
    this.openSocket();
  }

  private openSocket() {
    this.chatters.clear();
    this.emitter.emit("chatters", []);
    this.setStatus("connecting");
    this.logger?.(`Connecting to Twitch IRC #${this.channel}...`);

    const socket: ChatSocket = this.createSocket(this.url, {
      onOpen: () => {
        if (this.socket !== socket) return;
        this.sendHandshake(socket);
      },
      onMessage: (data) => {
        if (this.socket !== socket) return;
        data.split("\r\n").forEach((line) => {
          // A handler may have closed this socket mid-frame.
          if (!line || this.socket !== socket) return;
          this.handleLine(socket, line);
        });
      },
      onClose: (code, reason) => {
        if (this.socket !== socket) return;
        this.logger?.(`Twitch IRC disconnected (${code}${reason ? `: ${reason}` : ""}).`);
        this.releaseSocket();
        if (this.status !== "error") this.setStatus("disconnected");
        this.scheduleReconnect();
      },
      onError: (error) => {
        if (this.socket !== socket) return;
        this.logger?.(`Twitch IRC error: ${error.message}`);
        this.setStatus("error");
      }
    });
    this.socket = socket;
  }

  private sendHandshake(socket: ChatSocket) {
    const token = this.auth.token ? `oauth:${this.auth.token.replace(/^oauth:/, "")}` : "SCHMOOPIIE";
    const nick = this.auth.username?.toLowerCase() || `justinfan${Math.floor(Math.random() * 100000)}`;
    socket.send(`PASS ${token}`);
    socket.send(`NICK ${nick}`);
    socket.send("CAP REQ :twitch.tv/membership");
    socket.send("CAP REQ :twitch.tv/tags");
    socket.send("CAP REQ :twitch.tv/commands");
  }

  private handleLine(socket: ChatSocket, line: string) {
    if (line.startsWith("PING")) {
      socket.send(`PONG ${line.slice(5) || ":tmi.twitch.tv"}`);
      return;
    }

    const message = parseIrcMessage(line);
    if (!message) {
      this.debug?.(`Unparseable line: ${line}`);
      return;
    }

    switch (message.command) {
      case "001":
        this.logger?.(`Authenticated. Joining #${this.channel}.`);
        socket.send(`JOIN #${this.channel}`);
        this.reconnectAttempts = 0;
        this.setStatus("connected");
        return;
      case "353":
        (message.trailing ?? "")
          .split(" ")
          .filter(Boolean)
          .forEach((login) => this.chatters.add(login));
        this.publishChatters();
        return;
      case "366":
        this.publishChatters();
        return;
      case "JOIN":
        if (message.login && !this.chatters.has(message.login)) {
          this.chatters.add(message.login);
          this.publishChatters();
        }
        return;
      case "PART":
        if (message.login && this.chatters.delete(message.login)) {
          this.publishChatters();
        }
        return;
      case "USERSTATE":
        this.setModerator(isModeratorBadgeSet(message.tags.badges));
        return;
      case "ROOMSTATE":
        this.setRoomState(parseRoomState(message.tags));
        return;
      case "CLEARMSG":
        if (message.tags["target-msg-id"]) {
          this.emitter.emit("deletedMessage", message.tags["target-msg-id"]);
        }
        return;
      case "CLEARCHAT": {
        const target = message.trailing?.trim();
        if (target) this.emitter.emit("deletedByAuthor", target);
        return;
      }
      case "NOTICE":
        this.handleNotice(message);
        return;
      case "USERNOTICE":
        this.handleUserNotice(message, line);
        return;
      case "PRIVMSG":
        this.handlePrivmsg(message, line);
        return;
      case "RECONNECT":
        this.logger?.("Twitch IRC requested a reconnect.");
        socket.close();
        return;
      default:
        this.debug?.(`Ignoring ${message.command}.`);
    }
  }

  private handleNotice(message: IrcMessage) {
    const msgId = message.tags["msg-id"] ?? "";
    if (this.suppression.isSuppressed(msgId)) {
      this.debug?.(`Suppressing NOTICE msg-id=${msgId}.`);
      return;
    }
    this.emitter.emit("message", buildSystemEvent(message));
  }

  private handleUserNotice(message: IrcMessage, line: string) {
    if (message.tags["msg-id"]?.startsWith(POLL_NOTICE_PREFIX)) {
      const next = nextPollState(this.poll, message.tags);
      if (next !== this.poll) {
        this.poll = next;
        this.emitter.emit("poll", next);
      }
      return;
    }

    const event = normalizeTwitchMessage(message, { emotes: this.emotes });
    if (!event) {
      this.debug?.(`Failed to parse USERNOTICE: ${line}`);
      return;
    }
    this.emitter.emit("message", event);
  }

  private handlePrivmsg(message: IrcMessage, line: string) {
    const event = normalizeTwitchMessage(message, { emotes: this.emotes });
    if (event && event.text.trim()) {
      this.emitter.emit("message", event);
      return;
    }

    const fallback = salvageChatLine(line);
    if (fallback) {
      this.debug?.(`Parser fallback used for PRIVMSG from ${fallback.author ?? "unknown"}.`);
      this.emitter.emit("message", fallback);
      return;
    }
    this.debug?.(`Dropped PRIVMSG: ${line}`);
  }

  private publishChatters() {
    this.emitter.emit("chatters", this.getChatters());
  }

  private setModerator(isModerator: boolean) {
    if (isModerator === this.moderator) return;
    this.moderator = isModerator;
    this.emitter.emit("moderator", isModerator);
  }

  private setRoomState(state: RoomState | null) {
    this.roomState = state;
    this.emitter.emit("roomState", state);
  }

  private scheduleReconnect() {
    if (!this.autoReconnect) return;
    const session = this.session;
    const delay = Math.min(30_000, 1000 * 2 ** this.reconnectAttempts);
    this.reconnectAttempts += 1;
    this.logger?.(`Reconnecting to Twitch IRC in ${delay}ms.`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      // A disconnect or a fresh connect since scheduling makes this attempt stale.
      if (session !== this.session || this.socket) return;
      this.openSocket();
    }, delay);
  }

  private clearReconnectTimer() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private releaseSocket() {
    this.socket = null;
  }

  async disconnect() {
    this.session += 1;
    this.clearReconnectTimer();
    const socket = this.socket;
    this.releaseSocket();
    socket?.close();
    this.chatters.clear();
    this.publishChatters();
    this.setRoomState(null);
    this.setModerator(false);
    if (this.poll) {
      this.poll = null;
      this.emitter.emit("poll", null);
    }
    this.setStatus("disconnected");
  }

  private requireOpenSocket(): ChatSocket {
    if (!this.socket || !this.socket.isOpen() || this.status !== "connected") {
      throw new ChatConnectionError("Twitch connection is not ready.");
    }
    return this.socket;
  }

  private requireAccount(): string {
    const username = this.auth.username;
    if (!this.auth.token || !username || username.startsWith("justinfan")) {
      throw new ChatConnectionError("Twitch send requires an authenticated account.");
    }
    return username;
  }

  async sendMessage(message: string, options: SendMessageOptions = {}) {
    const content = message.replace(/[\r\n]+/g, " ").trim();
    if (!content) return;
    const replyTo = options.replyTo ? requireToken(options.replyTo, "reply id") : undefined;
    if (content.length > MAX_MESSAGE_LENGTH) {
      throw new ChatConnectionError("Message is too long.");
    }
    const username = this.requireAccount();
    const socket = this.requireOpenSocket();

    const replyPrefix = replyTo ? `@reply-parent-msg-id=${replyTo} ` : "";
    socket.send(`${replyPrefix}PRIVMSG #${this.channel} :${content}`);

    // Twitch does not echo our own PRIVMSG back.
    this.emitter.emit("message", {
      id: `local-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
      channel: this.channel,
      author: username,
      authorLogin: username.toLowerCase(),
      text: content,
      authorColor: normalizeAuthorColor(undefined),
      emotes: this.emotes?.scan(content) ?? [],
      badges: this.localBadges(username),
      kind: "standard",
      timestamp: new Date().toISOString(),
      tags: { localEcho: "1" },
      replyParentId: replyTo
    } satisfies ChatEvent);
  }

  private localBadges(username: string) {
    const badges: string[] = [];
    if (username.toLowerCase() === this.channel) badges.push("broadcaster");
    if (this.moderator) badges.push("moderator");
    return badges;
  }

  private sendCommand(command: string) {
    this.requireAccount();
    const socket = this.requireOpenSocket();
    socket.send(`PRIVMSG #${this.channel} :${command}`);
  }

  async timeout(login: string, seconds = DEFAULT_TIMEOUT_SECONDS) {
    this.sendCommand(`/timeout ${requireToken(login, "login")} ${seconds}`);
  }

  async ban(login: string) {
    this.sendCommand(`/ban ${requireToken(login, "login")}`);
  }

  async unban(login: string) {
    this.sendCommand(`/unban ${requireToken(login, "login")}`);
  }

  async deleteMessage(messageId: string) {
    this.sendCommand(`/delete ${requireToken(messageId, "message id")}`);
  }

  async votePoll(pollId: string, choiceId: string) {
    if (!this.votePollRequest) {
      throw new ChatConnectionError("Poll voting requires a REST client.");
    }
    await this.votePollRequest(pollId, choiceId);
  }
}
