import { z } from "zod";
import { HoneypotRequest, Message, Sender } from "./types";
import { ValidationError } from "./errors";

export interface RequestLimits {
  maxMessageLength: number;
  maxHistory?: number;
  now?: () => number;
}

// "user" is what some callers send for the honeypot's own side
const senderSchema = z
  .enum(["scammer", "agent", "user"])
  .transform((sender): Sender => (sender === "user" ? "agent" : sender));

const timestampSchema = z
  .union([z.number().int().nonnegative(), z.string().min(1)])
  .transform((value, ctx): number => {
    if (typeof value === "number") {
      return value;
    }
    const parsed = /^\d+$/.test(value) ? Number(value) : Date.parse(value);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid timestamp" });
      return z.NEVER;
    }
    return parsed;
  });

function buildSchema(limits: RequestLimits) {
  const messageSchema = z.object({
    sender: senderSchema,
    text: z.string().trim().min(1, "Message text is empty").max(limits.maxMessageLength),
    timestamp: timestampSchema.optional(),
  });

  return z.object({
    sessionId: z.string().trim().min(1, "sessionId is required").max(200),
    message: messageSchema.refine((message) => message.sender === "scammer", {
      message: "Inbound message must come from the scammer",
      path: ["sender"],
    }),
    conversationHistory: z.array(messageSchema).max(limits.maxHistory ?? 100).optional(),
    metadata: z
      .object({
        channel: z.string().optional(),
        language: z.string().optional(),
        locale: z.string().optional(),
      })
      .optional(),
  });
}

/**
 * Validate a raw request body.
 *
 * @throws ValidationError listing every problem found
 */
export function parseHoneypotRequest(body: unknown, limits: RequestLimits): HoneypotRequest {
  const result = buildSchema(limits).safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid request: ${issues.join("; ")}`, issues);
  }

  const now = limits.now ?? Date.now;
  const stamp = (message: { sender: Sender; text: string; timestamp?: number }): Message => ({
    sender: message.sender,
    text: message.text,
    timestamp: message.timestamp ?? now(),
  });

  const data = result.data;
  return {
    sessionId: data.sessionId,
    message: stamp(data.message),
    conversationHistory: (data.conversationHistory ?? []).map(stamp),
    metadata: data.metadata ?? {},
  };
}
