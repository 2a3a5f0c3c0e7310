import { z } from "zod";

export const eventSubSessionSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
  connected_at: z.string().optional(),
  keepalive_timeout_seconds: z.number().int().positive().nullish(),
  reconnect_url: z.string().nullish()
});

export const eventSubSubscriptionSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    type: z.string(),
    version: z.string().optional(),
    condition: z.record(z.string()).optional()
  })
  .passthrough();

export const eventSubMessageSchema = z.object({
  metadata: z.object({
    message_id: z.string(),
    message_type: z.string(),
    message_timestamp: z.string(),
    subscription_type: z.string().optional(),
    subscription_version: z.string().optional()
  }),
  payload: z
    .object({
      session: eventSubSessionSchema.optional(),
      subscription: eventSubSubscriptionSchema.optional(),
      event: z.unknown().optional()
    })
    .default({})
});

export type EventSubMessage = z.infer<typeof eventSubMessageSchema>;
export type EventSubSession = z.infer<typeof eventSubSessionSchema>;

export const parseEventSubMessage = (raw: string): EventSubMessage | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = eventSubMessageSchema.safeParse(json);
  return result.success ? result.data : null;
};

export type EventSubTransport = {
  method: "websocket";
  session_id: string;
};

export type EventSubSubscriptionRequest = {
  type: string;
  version: string;
  condition: Record<string, string>;
  transport: EventSubTransport;
};

export type EventSubSubscriptionResponse = {
  status: number;
  body: string;
};
