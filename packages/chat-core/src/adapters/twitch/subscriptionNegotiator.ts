import type { Logger } from "../../types";
import type { EventSubSubscriptionRequest, EventSubSubscriptionResponse } from "./eventSubModels";

export const WHISPER_SUBSCRIPTION_TYPE = "user.whisper.message";

export type CreateSubscription = (request: EventSubSubscriptionRequest) => Promise<EventSubSubscriptionResponse>;

export type NegotiationOutcome =
  | { kind: "subscribed"; candidateIndex: number; alreadyExisted: boolean }
  /** The condition shape was rejected; retry on a fresh session with `nextIndex`. */
  | { kind: "shapeRejected"; nextIndex: number; body: string }
  | { kind: "exhausted"; body: string }
  | { kind: "unauthorized" }
  | { kind: "forbidden"; body: string }
  | { kind: "rejected"; status: number; body: string }
  | { kind: "failed"; error: Error };

export type NegotiationRequest = {
  type: string;
  version: string;
  sessionId: string;
  candidates: Array<Record<string, string>>;
  startIndex?: number;
  createSubscription: CreateSubscription;
  logger?: Logger;
};

/**
 * Condition shapes for the whisper subscription, most specific first. The validator's
 * required fields are not reliably documented, so each is tried in turn.
 */
export const whisperConditionCandidates = (userId: string): Array<Record<string, string>> => [
  { user_id: userId, to_user_id: userId },
  { to_user_id: userId, user_id: userId },
  { to_user_id: userId },
  { user_id: userId }
];

export const isMissingFieldRejection = (body: string) => {
  const text = body.toLowerCase();
  return (
    text.includes("subscriptioncondition.user_id") ||
    text.includes("user_id' failed") ||
    (text.includes("user_id") && text.includes("required"))
  );
};

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

/**
 * Posts the subscription starting from `startIndex`. Stops at the first response that
 * decides the outcome; a missing-field 400 asks the caller for a fresh session before
 * the next candidate is tried.
 */
export const negotiateSubscription = async (request: NegotiationRequest): Promise<NegotiationOutcome> => {
  const { candidates, logger } = request;
  const index = request.startIndex ?? 0;
  const condition = candidates[index];
  if (!condition) {
    return { kind: "exhausted", body: "" };
  }

  logger?.(`Creating ${request.type} subscription with condition keys ${Object.keys(condition).join(",")}.`);

  let response: EventSubSubscriptionResponse;
  try {
    response = await request.createSubscription({
      type: request.type,
      version: request.version,
      condition,
      transport: { method: "websocket", session_id: request.sessionId }
    });
  } catch (error) {
    return { kind: "failed", error: toError(error) };
  }

  const { status, body } = response;
  if (status >= 200 && status < 300) {
    return { kind: "subscribed", candidateIndex: index, alreadyExisted: false };
  }
  if (status === 409) {
    return { kind: "subscribed", candidateIndex: index, alreadyExisted: true };
  }
  if (status === 400) {
    if (!isMissingFieldRejection(body)) {
      return { kind: "rejected", status, body };
    }
    const nextIndex = index + 1;
    return nextIndex < candidates.length ? { kind: "shapeRejected", nextIndex, body } : { kind: "exhausted", body };
  }
  if (status === 401) {
    return { kind: "unauthorized" };
  }
  if (status === 403) {
    return { kind: "forbidden", body };
  }
  return { kind: "rejected", status, body };
};
