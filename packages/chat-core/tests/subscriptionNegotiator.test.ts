import { describe, expect, it, vi } from "vitest";
import {
  isMissingFieldRejection,
  negotiateSubscription,
  whisperConditionCandidates,
  type CreateSubscription
} from "../src/adapters/twitch/subscriptionNegotiator";

const MISSING_USER_ID =
  '{"error":"Bad Request","status":400,"message":"Key: \'SubscriptionCondition.user_id\' Error:Field validation for \'user_id\' failed on the \'required\' tag"}';

const negotiate = (createSubscription: CreateSubscription, startIndex?: number) =>
  negotiateSubscription({
    type: "user.whisper.message",
    version: "1",
    sessionId: "session-1",
    candidates: whisperConditionCandidates("42"),
    startIndex,
    createSubscription
  });

const respond = (status: number, body = "") => vi.fn<CreateSubscription>(async () => ({ status, body }));

describe("isMissingFieldRejection", () => {
  it("recognises missing user_id validation errors", () => {
    expect(isMissingFieldRejection(MISSING_USER_ID)).toBe(true);
    expect(isMissingFieldRejection("USER_ID is required")).toBe(true);
    expect(isMissingFieldRejection("invalid transport")).toBe(false);
  });
});

describe("whisperConditionCandidates", () => {
  it("lists shapes from most to least specific", () => {
    const candidates = whisperConditionCandidates("42");
    expect(candidates.map((condition) => Object.keys(condition))).toEqual([
      ["user_id", "to_user_id"],
      ["to_user_id", "user_id"],
      ["to_user_id"],
      ["user_id"]
    ]);
  });
});

describe("negotiateSubscription", () => {
  it("posts the first candidate on the session", async () => {
    const create = respond(202, "{}");
    await expect(negotiate(create)).resolves.toEqual({ kind: "subscribed", candidateIndex: 0, alreadyExisted: false });
    expect(create).toHaveBeenCalledWith({
      type: "user.whisper.message",
      version: "1",
      condition: { user_id: "42", to_user_id: "42" },
      transport: { method: "websocket", session_id: "session-1" }
    });
  });

  it("accepts an existing subscription", async () => {
    await expect(negotiate(respond(409), 2)).resolves.toEqual({ kind: "subscribed", candidateIndex: 2, alreadyExisted: true });
  });

  it("asks for the next shape on a missing-field rejection", async () => {
    await expect(negotiate(respond(400, MISSING_USER_ID))).resolves.toEqual({
      kind: "shapeRejected",
      nextIndex: 1,
      body: MISSING_USER_ID
    });
  });

  it("reports exhaustion after the last shape", async () => {
    await expect(negotiate(respond(400, MISSING_USER_ID), 3)).resolves.toEqual({ kind: "exhausted", body: MISSING_USER_ID });

    const create = respond(202);
    await expect(negotiate(create, 4)).resolves.toEqual({ kind: "exhausted", body: "" });
    expect(create).not.toHaveBeenCalled();
  });

  it("stops on other rejections", async () => {
    await expect(negotiate(respond(400, "invalid transport"))).resolves.toEqual({
      kind: "rejected",
      status: 400,
      body: "invalid transport"
    });
    await expect(negotiate(respond(401))).resolves.toEqual({ kind: "unauthorized" });
    await expect(negotiate(respond(403, "missing scope"))).resolves.toEqual({ kind: "forbidden", body: "missing scope" });
    await expect(negotiate(respond(500, "oops"))).resolves.toEqual({ kind: "rejected", status: 500, body: "oops" });
  });

  it("reports network failures", async () => {
    const outcome = await negotiate(async () => {
      throw new Error("socket hang up");
    });
    expect(outcome.kind).toBe("failed");
    expect(outcome.kind === "failed" ? outcome.error.message : "").toBe("socket hang up");
  });
});
