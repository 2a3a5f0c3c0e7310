import EventEmitter from "eventemitter3";
import { TWITCH_EVENTSUB_URL } from "../../config";
import { verboseLogger } from "../../logger";
import { createWebSocket, type ChatSocket, type SocketFactory } from "../../socket";
import type { ChatAdapterStatus, Logger, Unsubscribe, WhisperMessage } from "../../types";
import { parseEventSubMessage, type EventSubMessage, type EventSubSession } from "./eventSubModels";
import {
  DEFAULT_KEEPALIVE_TIMEOUT_SECONDS,
  isKeepaliveExpired,
  keepaliveCheckIntervalMs,
  reconnectDelayMs,
  type KeepaliveState
} from "./keepalive";
import {
  WHISPER_SUBSCRIPTION_TYPE,
  negotiateSubscription,
  whisperConditionCandidates,
  type CreateSubscription,
  type NegotiationOutcome
} from "./subscriptionNegotiator";
import { decodeWhisperEvent } from "./whisper";

export type EventSubAdapterOptions = {
  /** Account the whisper subscription is created for. */
  userId: string;
  userLogin?: string;
  createSubscription: CreateSubscription;
  /** Called once when subscription creation answers 401. */
  onUnauthorized?: () => void;
  subscriptionType?: string;
  subscriptionVersion?: string;
  candidates?: Array<Record<string, string>>;
  url?: string;
  logger?: Logger;
  verbose?: boolean;
  createSocket?: SocketFactory;
  now?: () => number;
};

type EventSubAdapterEvents = {
  status: (status: ChatAdapterStatus) => void;
  whisper: (message: WhisperMessage) => void;
  notification: (type: string, event: unknown) => void;
  subscription: (outcome: NegotiationOutcome) => void;
};

export class EventSubAdapter {
  private emitter = new EventEmitter<EventSubAdapterEvents>();
  private socket: ChatSocket | null = null;
  private status: ChatAdapterStatus = "disconnected";
  private running = false;
  private session = 0;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private sessionId?: string;
  private negotiatedSessionId?: string;
  private candidateIndex = 0;
  private lastMessageAt = 0;
  private keepaliveTimeoutSeconds = DEFAULT_KEEPALIVE_TIMEOUT_SECONDS;
  private readonly userId: string;
  private readonly userLogin?: string;
  private readonly createSubscription: CreateSubscription;
  private readonly onUnauthorized?: () => void;
  private readonly subscriptionType: string;
  private readonly subscriptionVersion: string;
  private readonly candidates: Array<Record<string, string>>;
  private readonly url: string;
  private readonly logger?: Logger;
  private readonly debug?: Logger;
  private readonly createSocket: SocketFactory;
  private readonly now: () => number;

  constructor(options: EventSubAdapterOptions) {
    this.userId = options.userId;
    this.userLogin = options.userLogin;
    this.createSubscription = options.createSubscription;
    this.onUnauthorized = options.onUnauthorized;
    this.subscriptionType = options.subscriptionType ?? WHISPER_SUBSCRIPTION_TYPE;
    this.subscriptionVersion = options.subscriptionVersion ?? "1";
    this.candidates = options.candidates ?? whisperConditionCandidates(options.userId);
    this.url = options.url ?? TWITCH_EVENTSUB_URL;
    this.logger = options.logger;
    this.debug = verboseLogger(options.logger, options.verbose);
    this.createSocket = options.createSocket ?? createWebSocket;
    this.now = options.now ?? Date.now;
  }

  onStatus(handler: (status: ChatAdapterStatus) => void) {
    return this.subscribe("status", handler);
  }

  onWhisper(handler: (message: WhisperMessage) => void) {
    return this.subscribe("whisper", handler);
  }

  onNotification(handler: (type: string, event: unknown) => void) {
    return this.subscribe("notification", handler);
  }

  onSubscription(handler: (outcome: NegotiationOutcome) => void) {
    return this.subscribe("subscription", handler);
  }

  getStatus() {
    return this.status;
  }

  getKeepaliveState(): KeepaliveState {
    return {
      sessionId: this.sessionId,
      lastMessageAt: this.lastMessageAt,
      keepaliveTimeoutSeconds: this.keepaliveTimeoutSeconds,
      reconnectAttempts: this.reconnectAttempts
    };
  }

  private subscribe<K extends keyof EventSubAdapterEvents>(
    event: K,
    handler: EventEmitter.EventListener<EventSubAdapterEvents, K>
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

  start() {
    if (this.running) return;
    this.running = true;
    this.session += 1;
    this.reconnectAttempts = 0;
    this.candidateIndex = 0;
    this.negotiatedSessionId = undefined;
    this.openSocket(this.url);
  }

  stop(status: ChatAdapterStatus = "disconnected") {
    this.running = false;
    this.session += 1;
    this.clearReconnectTimer();
    this.stopKeepaliveMonitor();
    const socket = this.socket;
    this.socket = null;
    socket?.close(1000, "Client stopped");
    this.sessionId = undefined;
    this.setStatus(status);
  }

  private openSocket(url: string) {
    this.setStatus("connecting");
    this.logger?.(`Connecting to EventSub at ${url}...`);
    this.lastMessageAt = this.now();

    const socket: ChatSocket = this.createSocket(url, {
      onOpen: () => {
        if (this.socket !== socket) return;
        this.debug?.("EventSub socket open; waiting for welcome.");
      },
      onMessage: (data) => {
        if (this.socket !== socket) return;
        this.lastMessageAt = this.now();
        const message = parseEventSubMessage(data);
        if (!message) {
          this.debug?.(`Unparseable EventSub frame: ${data}`);
          return;
        }
        this.handleMessage(socket, message);
      },
      onClose: (code, reason) => {
        if (this.socket !== socket) return;
        this.logger?.(`EventSub disconnected (${code}${reason ? `: ${reason}` : ""}).`);
        this.recycleSocket();
      },
      onError: (error) => {
        if (this.socket !== socket) return;
        this.logger?.(`EventSub error: ${error.message}`);
        this.setStatus("error");
      }
    });
    this.socket = socket;
    this.startKeepaliveMonitor();
  }

  private handleMessage(socket: ChatSocket, message: EventSubMessage) {
    const { session, subscription, event } = message.payload;

    switch (message.metadata.message_type) {
      case "session_welcome":
        this.reconnectAttempts = 0;
        this.setStatus("connected");
        if (session) this.adoptSession(socket, session);
        return;
      case "session_keepalive":
        this.reconnectAttempts = 0;
        if (session) this.adoptSession(socket, session);
        return;
      case "session_reconnect":
        if (session?.reconnect_url) {
          this.logger?.("EventSub requested a reconnect.");
          this.migrate(socket, session.reconnect_url);
        }
        return;
      case "notification": {
        const type = subscription?.type ?? message.metadata.subscription_type ?? "";
        this.emitter.emit("notification", type, event);
        if (type === WHISPER_SUBSCRIPTION_TYPE) this.handleWhisper(event);
        return;
      }
      case "revocation":
        this.logger?.(`EventSub revoked ${subscription?.type ?? "a"} subscription (${subscription?.status ?? "unknown"}).`);
        this.negotiatedSessionId = undefined;
        return;
      default:
        this.debug?.(`Ignoring EventSub ${message.metadata.message_type}.`);
    }
  }

  private handleWhisper(event: unknown) {
    const whisper = decodeWhisperEvent(event, {
      now: this.now,
      currentUser: this.userLogin ? { id: this.userId, login: this.userLogin } : undefined
    });
    if (!whisper) {
      this.logger?.(`Failed to decode whisper event: ${JSON.stringify(event)}`);
      return;
    }
    this.emitter.emit("whisper", whisper);
  }

  private adoptSession(socket: ChatSocket, session: EventSubSession) {
    this.sessionId = session.id;
    if (session.keepalive_timeout_seconds && session.keepalive_timeout_seconds !== this.keepaliveTimeoutSeconds) {
      this.keepaliveTimeoutSeconds = session.keepalive_timeout_seconds;
      this.startKeepaliveMonitor();
    }
    if (this.negotiatedSessionId === session.id) return;
    this.negotiatedSessionId = session.id;
    this.negotiate(socket, session.id).catch((error: unknown) => {
      this.logger?.(`EventSub subscription failed: ${String(error)}`);
    });
  }

  private async negotiate(socket: ChatSocket, sessionId: string) {
    const outcome = await negotiateSubscription({
      type: this.subscriptionType,
      version: this.subscriptionVersion,
      sessionId,
      candidates: this.candidates,
      startIndex: this.candidateIndex,
      createSubscription: this.createSubscription,
      logger: this.debug
    });
    if (this.socket !== socket) return;
    this.emitter.emit("subscription", outcome);

    switch (outcome.kind) {
      case "subscribed":
        this.candidateIndex = outcome.candidateIndex;
        this.logger?.(
          outcome.alreadyExisted
            ? `${this.subscriptionType} subscription already exists.`
            : `Subscribed to ${this.subscriptionType}.`
        );
        return;
      case "shapeRejected":
        this.candidateIndex = outcome.nextIndex;
        this.logger?.(`Subscription condition rejected; retrying on a new session: ${outcome.body}`);
        this.recycleSocket();
        return;
      case "exhausted":
        this.logger?.(`Every subscription condition was rejected: ${outcome.body}`);
        this.stop("error");
        return;
      case "unauthorized":
        this.logger?.("Subscription request unauthorized; session invalidated.");
        this.onUnauthorized?.();
        this.stop("error");
        return;
      case "forbidden":
        this.logger?.(`Subscription forbidden: ${outcome.body}`);
        this.stop("error");
        return;
      case "rejected":
        this.logger?.(`Subscription request failed (${outcome.status}): ${outcome.body}`);
        if (outcome.status === 400) {
          this.stop("error");
        } else {
          this.recycleSocket();
        }
        return;
      case "failed":
        this.logger?.(`Subscription request failed: ${outcome.error.message}`);
        this.recycleSocket();
        return;
    }
  }

  /** Opens the replacement session before dropping the old one. */
  private migrate(oldSocket: ChatSocket, url: string) {
    this.stopKeepaliveMonitor();
    this.openSocket(url);
    oldSocket.close(1000, "Reconnecting");
  }

  /** Detaches the current socket and schedules a fresh session. A silent socket is terminated. */
  private recycleSocket(silent = false) {
    const socket = this.socket;
    this.socket = null;
    this.sessionId = undefined;
    this.stopKeepaliveMonitor();
    if (silent) {
      socket?.terminate();
    } else {
      socket?.close(1000, "Reconnecting");
    }
    if (!this.running) return;
    if (this.status !== "error") this.setStatus("disconnected");
    this.scheduleReconnect();
  }

  private scheduleReconnect() {
    this.clearReconnectTimer();
    const session = this.session;
    this.reconnectAttempts += 1;
    const delay = reconnectDelayMs(this.reconnectAttempts);
    this.logger?.(`Reconnecting to EventSub in ${delay}ms (attempt ${this.reconnectAttempts}).`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (session !== this.session || !this.running || this.socket) return;
      this.openSocket(this.url);
    }, delay);
  }

  private clearReconnectTimer() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private startKeepaliveMonitor() {
    this.stopKeepaliveMonitor();
    this.keepaliveTimer = setInterval(() => {
      if (!this.socket) return;
      if (!isKeepaliveExpired(this.now(), this.lastMessageAt, this.keepaliveTimeoutSeconds)) return;
      this.logger?.(`No EventSub traffic for ${this.now() - this.lastMessageAt}ms; reconnecting.`);
      this.recycleSocket(true);
    }, keepaliveCheckIntervalMs(this.keepaliveTimeoutSeconds));
  }

  private stopKeepaliveMonitor() {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }
}
