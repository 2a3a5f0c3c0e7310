export const DEFAULT_KEEPALIVE_TIMEOUT_SECONDS = 90;
export const KEEPALIVE_GRACE_MS = 30_000;
export const MIN_KEEPALIVE_CHECK_MS = 15_000;
export const RECONNECT_STEP_MS = 2000;
export const MAX_RECONNECT_DELAY_MS = 60_000;

export type KeepaliveState = {
  sessionId?: string;
  lastMessageAt: number;
  keepaliveTimeoutSeconds: number;
  reconnectAttempts: number;
};

export const keepaliveCheckIntervalMs = (timeoutSeconds: number) =>
  Math.max(MIN_KEEPALIVE_CHECK_MS, (timeoutSeconds * 1000) / 2);

export const keepaliveDeadlineMs = (timeoutSeconds: number) => timeoutSeconds * 1000 + KEEPALIVE_GRACE_MS;

/** Any traffic counts as liveness; only silence strictly past timeout + grace expires. */
export const isKeepaliveExpired = (now: number, lastMessageAt: number, timeoutSeconds: number) =>
  now - lastMessageAt > keepaliveDeadlineMs(timeoutSeconds);

/** Delay before reconnect attempt `attempt` (1-based). */
export const reconnectDelayMs = (attempt: number) =>
  Math.min(RECONNECT_STEP_MS * Math.max(1, attempt), MAX_RECONNECT_DELAY_MS);
