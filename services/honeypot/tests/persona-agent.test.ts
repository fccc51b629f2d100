import {
  loadPersonaProfile,
  PersonaAgent,
  REDACTED_ID,
  REDACTED_NUMBER,
} from "../src/persona-agent";
import { PatternLibrary } from "../src/patterns";
import { CircuitBreaker } from "../src/circuit-breaker";
import { TextGenerator } from "../src/generation";
import { ConversationTurn } from "../src/types";
import {
  HangingGenerator,
  ScriptedGenerator,
  sessionWith,
  turn,
  verdict,
} from "./fixtures";

const PAYMENT_FALLBACK =
  "Paise bhejne ka tareeka mujhe nahi aata beta, aap apna naam aur bank batao, main bete se puchti hu";
const DEFAULT_FALLBACK = "Haan ji? Kaun bol raha hai? Awaaz saaf nahi aa rahi...";

describe("PersonaAgent", () => {
  const patterns = PatternLibrary.compile();
  const profile = loadPersonaProfile();

  function agentWith(generator: TextGenerator | null, breaker: CircuitBreaker | null = null) {
    return new PersonaAgent(profile, generator, patterns, {
      generationTimeoutMs: 20,
      historyWindow: 2,
      breaker,
    });
  }

  describe("Self-leak guard", () => {
    const agent = agentWith(null);

    it("should redact phone numbers", () => {
      expect(agent.guard("Call me on 9876543210 ok")).toBe(`Call me on ${REDACTED_NUMBER} ok`);
    });

    it("should redact UPI handles", () => {
      expect(agent.guard("send to me@ybl")).toBe(`send to ${REDACTED_ID}`);
    });

    it("should redact spaced-out digit runs", () => {
      expect(agent.guard("code 1 2 3 4 5 6 7 8 9 done")).toBe(`code ${REDACTED_NUMBER} done`);
    });

    it("should leave links and ordinary text alone", () => {
      expect(agent.guard("see https://example.com/x beta")).toBe("see https://example.com/x beta");
    });
  });

  describe("Replies", () => {
    it("should use the category fallback when no generator is configured", async () => {
      const agent = agentWith(null);
      const session = sessionWith([turn("scammer", "Send bank details")]);

      await expect(agent.reply(session, verdict(["lottery", "payment-request"]))).resolves.toBe(
        PAYMENT_FALLBACK
      );
    });

    it("should rotate fallback replies with the number of agent turns", () => {
      const agent = agentWith(null);
      const session = sessionWith([
        turn("scammer", "hello"),
        turn("agent", "haan ji"),
        turn("scammer", "hello again"),
      ]);

      expect(agent.fallbackReply(session, verdict([]))).toBe(
        "Achha beta, thoda phir se samjhao, mujhe samajh nahi aaya"
      );
    });

    it("should return the guarded generated reply", async () => {
      const agent = agentWith(new ScriptedGenerator(["Mera number 9876543210 hai"]));
      const session = sessionWith([turn("scammer", "give your number")]);

      await expect(agent.reply(session, verdict([]))).resolves.toBe(
        `Mera number ${REDACTED_NUMBER} hai`
      );
    });

    it("should fall back when generation times out", async () => {
      const agent = agentWith(new HangingGenerator());
      const session = sessionWith([turn("scammer", "Hello sir")]);

      await expect(agent.reply(session, verdict([], 0))).resolves.toBe(DEFAULT_FALLBACK);
    });

    it("should fall back when the generated reply is blank", async () => {
      const agent = agentWith(new ScriptedGenerator(["   "]));
      const session = sessionWith([turn("scammer", "Hello sir")]);

      await expect(agent.reply(session, verdict([], 0))).resolves.toBe(DEFAULT_FALLBACK);
    });

    it("should stop calling the generator once the circuit opens", async () => {
      const generator = new HangingGenerator();
      const breaker = new CircuitBreaker({ name: "generation", threshold: 1, resetTimeout: 60000 });
      const agent = agentWith(generator, breaker);
      const session = sessionWith([turn("scammer", "Hello sir")]);

      await agent.reply(session, verdict([], 0));
      const second = await agent.reply(session, verdict([], 0));

      expect(generator.calls).toBe(1);
      expect(breaker.isOpen()).toBe(true);
      expect(second).toBe(DEFAULT_FALLBACK);
    });
  });

  describe("Generation request", () => {
    it("should send only the most recent turns", () => {
      const generator = new ScriptedGenerator(["ok"]);
      const agent = agentWith(generator);
      const session = sessionWith([
        turn("scammer", "one"),
        turn("agent", "two"),
        turn("scammer", "three"),
      ]);

      const request = agent.buildRequest(session, verdict([]));

      expect(request.history.map((m) => m.text)).toEqual(["two", "three"]);
      expect(request.systemPersona).toContain("You are Savitri Sharma, 67 years old");
    });

    it("should ask for the first missing kinds of intelligence", () => {
      const agent = agentWith(null);
      const session = sessionWith([turn("scammer", "hello")], [
        { kind: "phone", value: "+919876543210", firstSeenTurn: 0, confidence: 0.9 },
      ]);

      const instructions = agent.buildInstructions(session, verdict(["lottery"]));

      expect(instructions).toContain(
        "GOAL: Try to get their UPI ID (your grandson will send the money); ask which bank and account number the money should go to."
      );
      expect(instructions).toContain("SITUATION:");
      expect(instructions).not.toContain("STALL:");
    });

    it("should stall after repeated payment pressure", () => {
      const agent = agentWith(null);
      const turns: ConversationTurn[] = [];
      for (let i = 0; i < 4; i++) {
        turns.push(turn("scammer", "pay now"), turn("agent", "haan ji"));
      }
      const session = sessionWith(turns);

      const instructions = agent.buildInstructions(session, verdict(["payment-request"]));

      expect(instructions).toContain("STALL:");
    });
  });

  it("should summarise the session in a note", () => {
    const agent = agentWith(null);
    const session = sessionWith([turn("scammer", "pay")], [
      { kind: "upi", value: "scammer@upi", firstSeenTurn: 0, confidence: 0.95 },
    ]);

    expect(agent.note(session, verdict(["lottery"], 0.7022))).toBe(
      "Scam type: lottery. Message #1. Score 0.70. Intel gathered: 1 UPI"
    );
  });

  describe("Profile loading", () => {
    const persona = {
      name: "Test",
      age: 70,
      background: [],
      languageStyle: "plain",
      samplePhrases: [],
      stallAfterTurns: 2,
    };

    it("should reject fallback replies containing digits", () => {
      expect(() =>
        loadPersonaProfile({ persona, fallbackReplies: { default: ["call 123"] } })
      ).toThrow("fallback replies must not contain digits");
    });

    it("should require a default fallback", () => {
      expect(() =>
        loadPersonaProfile({ persona, fallbackReplies: { lottery: ["wow"] } })
      ).toThrow("fallbackReplies needs a default entry");
    });
  });
});
