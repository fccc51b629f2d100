import { ScamAssist, ScamDetector } from "../src/scam-detector";
import { PatternLibrary } from "../src/patterns";
import { ConversationTurn, Entity } from "../src/types";

const LOTTERY = "Congratulations! You won 10 lakh lottery. Send bank details.";
const KYC = "Your KYC is pending, verify now";

function scammerTurn(text: string, detectedCategories: string[]): ConversationTurn {
  return {
    message: { sender: "scammer", text, timestamp: 0 },
    detectedCategories,
    extractedEntities: [],
    matchedTerms: [],
  };
}

describe("ScamDetector", () => {
  const patterns = PatternLibrary.compile();

  describe("Rule scoring", () => {
    const detector = new ScamDetector(patterns);

    it("should flag the lottery example as a scam", () => {
      const verdict = detector.detect(LOTTERY, []);

      expect(verdict.isScam).toBe(true);
      expect(verdict.score).toBeCloseTo(0.7022, 4);
      expect(verdict.categories).toEqual(["lottery", "payment-request"]);
      expect(verdict.assisted).toBe(false);
    });

    it("should score a friendly message as zero", () => {
      expect(detector.detect("Hi, how are you today?", [])).toEqual({
        isScam: false,
        score: 0,
        categories: [],
        assisted: false,
      });
    });

    it("should boost a turn that introduces a payment identifier", () => {
      const upi: Entity = { kind: "upi", value: "scammer@upi", firstSeenTurn: 0, confidence: 0.95 };

      const without = detector.detect("pay to scammer@upi", []);
      const withEntity = detector.detect("pay to scammer@upi", [], [upi]);

      expect(without.score).toBeCloseTo(0.176, 4);
      expect(withEntity.score).toBeCloseTo(0.326, 4);
    });

    it("should add a time-pressure boost", () => {
      const verdict = detector.detect("Reply within 2 hours", []);

      expect(verdict.score).toBeCloseTo(0.1, 4);
      expect(verdict.categories).toEqual([]);
    });

    it("should carry pressure from categories used in earlier turns", () => {
      const history = [scammerTurn("earlier", ["kyc", "threat"])];

      expect(detector.detect("Hello", history).score).toBeCloseTo(0.1, 4);
    });

    it("should cap the history boost", () => {
      const history = [
        scammerTurn("earlier", ["kyc", "threat", "refund", "investment"]),
      ];

      expect(detector.detect("Hello", history).score).toBeCloseTo(0.15, 4);
    });

    it("should ignore categories on agent turns", () => {
      const agentTurn: ConversationTurn = {
        message: { sender: "agent", text: "haan ji", timestamp: 0 },
        detectedCategories: ["kyc"],
        extractedEntities: [],
        matchedTerms: [],
      };

      expect(detector.detect("Hello", [agentTurn]).score).toBe(0);
    });

    it("should be deterministic", () => {
      const history = [scammerTurn("earlier", ["urgency"])];

      expect(detector.detect(LOTTERY, history)).toEqual(detector.detect(LOTTERY, history));
    });
  });

  describe("Assist", () => {
    function fakeAssist(
      impl: ScamAssist["assess"]
    ): ScamAssist & { assess: jest.Mock } {
      return { assess: jest.fn(impl) };
    }

    it("should blend the assist opinion for an ambiguous score", async () => {
      const assist = fakeAssist(async () => ({ isScam: true, confidence: 0.9 }));
      const detector = new ScamDetector(patterns, { threshold: 0.4, assist });

      const verdict = await detector.detectWithAssist(KYC, []);

      expect(assist.assess).toHaveBeenCalledTimes(1);
      expect(verdict.isScam).toBe(true);
      expect(verdict.score).toBeCloseTo(0.608, 4);
      expect(verdict.categories).toEqual(["kyc"]);
      expect(verdict.assisted).toBe(true);
    });

    it("should lower the score when the assist is sure it is not a scam", async () => {
      const assist = fakeAssist(async () => ({ isScam: false, confidence: 0.95 }));
      const detector = new ScamDetector(patterns, { threshold: 0.4, assist });

      const verdict = await detector.detectWithAssist(KYC, []);

      expect(verdict.score).toBeCloseTo(0.183, 4);
      expect(verdict.isScam).toBe(false);
      expect(verdict.assisted).toBe(true);
    });

    it("should derive isScam from the blended score", async () => {
      const assist = fakeAssist(async () => ({ isScam: true, confidence: 0.05 }));
      const detector = new ScamDetector(patterns, { threshold: 0.4, assist });

      const verdict = await detector.detectWithAssist(KYC, []);

      expect(verdict.score).toBeCloseTo(0.183, 4);
      expect(verdict.isScam).toBe(verdict.score >= 0.4);
      expect(verdict.isScam).toBe(false);
    });

    it("should not consult the assist outside the band", async () => {
      const assist = fakeAssist(async () => ({ isScam: true, confidence: 1 }));
      const detector = new ScamDetector(patterns, { threshold: 0.4, assist });

      const verdict = await detector.detectWithAssist("Hi there", []);

      expect(assist.assess).not.toHaveBeenCalled();
      expect(verdict.score).toBe(0);
    });

    it("should fall back to the rule verdict when the assist fails", async () => {
      const assist = fakeAssist(async () => {
        throw new Error("model unavailable");
      });
      const detector = new ScamDetector(patterns, { threshold: 0.4, assist });

      const verdict = await detector.detectWithAssist(KYC, []);

      expect(verdict.assisted).toBe(false);
      expect(verdict.score).toBeCloseTo(0.316, 4);
      expect(verdict.isScam).toBe(false);
    });

    it("should fall back to the rule verdict when the assist times out", async () => {
      const assist = fakeAssist(() => new Promise(() => undefined));
      const detector = new ScamDetector(patterns, {
        threshold: 0.4,
        assist,
        assistTimeoutMs: 20,
      });

      const verdict = await detector.detectWithAssist(KYC, []);

      expect(verdict.assisted).toBe(false);
      expect(verdict.score).toBeCloseTo(0.316, 4);
    });
  });
});
