import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { z } from "zod";
import { ConversationTurn, Message } from "./types";
import { GenerationRequest, TextGenerator } from "./generation";
import { ScamAssist } from "./scam-detector";
import { GenerationFailure } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("openai-client");

export interface OpenAiOptions {
  apiKey: string;
  model: string;
  baseUrl?: string | null;
  client?: OpenAI;
}

const ASSIST_SYSTEM_PROMPT = `You review chat messages received by a possible fraud victim in India.
Decide whether the latest message is part of a scam (lottery, KYC, fake bank or government official, OTP theft, investment, refund or phishing).
Respond with JSON only: {"isScam": boolean, "confidence": number between 0 and 1}, where confidence is how sure you are of your isScam decision.`;

const assistResponseSchema = z.object({
  isScam: z.boolean(),
  confidence: z.number().min(0).max(1),
});

function toChatMessage(message: Message): ChatCompletionMessageParam {
  // The honeypot speaks as the assistant, the scammer as the user
  return message.sender === "scammer"
    ? { role: "user", content: message.text }
    : { role: "assistant", content: message.text };
}

function createClient(options: OpenAiOptions): OpenAI {
  return (
    options.client ??
    new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? undefined,
      maxRetries: 0,
    })
  );
}

/**
 * Chat-completions backed reply generator.
 */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(
    private readonly options: OpenAiOptions,
    private readonly temperature = 0.8
  ) {
    this.client = createClient(options);
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      {
        role: "system",
        content: `${request.systemPersona}\n\n${request.instructions}`,
      },
      ...request.history.map(toChatMessage),
    ];

    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages,
        temperature: this.temperature,
        max_tokens: 200,
      },
      { signal }
    );

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GenerationFailure("Generator returned no text");
    }

    logger.debug(
      { model: this.options.model, length: content.length },
      "Reply generated"
    );
    return content;
  }
}

/**
 * Second-opinion scam classifier for scores close to the threshold.
 */
export class OpenAiScamAssist implements ScamAssist {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiOptions) {
    this.client = createClient(options);
  }

  async assess(
    text: string,
    history: readonly ConversationTurn[],
    signal: AbortSignal
  ): Promise<{ isScam: boolean; confidence: number }> {
    const context = history
      .slice(-5)
      .map((turn) => `${turn.message.sender}: ${turn.message.text.slice(0, 100)}`)
      .join("\n");

    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: [
          { role: "system", content: ASSIST_SYSTEM_PROMPT },
          {
            role: "user",
            content: `Earlier messages:\n${context || "(none)"}\n\nLatest message:\n${text}`,
          },
        ],
        temperature: 0.1,
        response_format: { type: "json_object" },
      },
      { signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new GenerationFailure("Assist returned no content");
    }
    const parsed: unknown = JSON.parse(content);
    return assistResponseSchema.parse(parsed);
  }
}
