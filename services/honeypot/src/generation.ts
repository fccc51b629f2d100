import { Message } from "./types";

/**
 * Everything the text-generation capability gets for one reply.
 */
export interface GenerationRequest {
  systemPersona: string;
  history: Message[];
  instructions: string;
}

/**
 * Opaque text-generation capability. Output is untrusted.
 */
export interface TextGenerator {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}
