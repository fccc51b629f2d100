import { classifyDigits, PatternLibrary } from "../src/patterns";

describe("PatternLibrary", () => {
  const patterns = PatternLibrary.compile();

  describe("Entity matching", () => {
    it("should match a UPI handle with its span", () => {
      expect(patterns.match("pay to scammer@upi now")).toEqual([
        {
          candidates: ["upi"],
          raw: "scammer@upi",
          span: { start: 7, end: 18 },
          form: "upi",
        },
      ]);
    });

    it("should not mistake an email address for a UPI handle", () => {
      expect(patterns.match("mail john@example.com")).toEqual([]);
    });

    it("should strip trailing punctuation from URLs and not match the shortener twice", () => {
      const matches = patterns.match("Visit https://bit.ly/abc123.");

      expect(matches).toHaveLength(1);
      expect(matches[0].raw).toBe("https://bit.ly/abc123");
      expect(matches[0].form).toBe("url");
    });

    it("should match a grouped Indian mobile number as a phone", () => {
      const [match] = patterns.match("call 98765 43210");

      expect(match.form).toBe("grouped");
      expect(match.candidates).toEqual(["phone"]);
      expect(match.digits).toBe("9876543210");
    });

    it("should leave a bare mobile-looking number ambiguous", () => {
      const [match] = patterns.match("9876543210");

      expect(match.form).toBe("bare");
      expect(match.candidates).toEqual(["phone", "bankAccount"]);
    });

    it("should read ten spelled-out digits", () => {
      const [match] = patterns.match(
        "nine eight seven six five four three two one zero"
      );

      expect(match.form).toBe("spelled");
      expect(match.digits).toBe("9876543210");
    });

    it("should ignore short runs of spelled digits", () => {
      expect(patterns.match("one two three")).toEqual([]);
    });
  });

  describe("classifyDigits", () => {
    it.each([
      ["9876543210", ["phone", "bankAccount"]],
      ["09876543210", ["phone", "bankAccount"]],
      ["919876543210", ["phone", "bankAccount"]],
      ["123456789012", ["bankAccount"]],
      ["12345678", []],
    ])("should classify %s", (digits, expected) => {
      expect(classifyDigits(digits)).toEqual(expected);
    });
  });

  describe("Indicators", () => {
    it("should combine term strengths per category", () => {
      const strengths = patterns.scoreIndicators(
        "Congratulations! You won 10 lakh lottery. Send bank details."
      );

      expect([...strengths.keys()].sort()).toEqual(["lottery", "payment-request"]);
      expect(strengths.get("lottery")).toBeCloseTo(0.9244, 4);
      expect(strengths.get("payment-request")).toBeCloseTo(0.6, 4);
    });

    it("should report each matched term once", () => {
      const terms = patterns
        .findIndicators("Share OTP now, the OTP expires soon")
        .map((hit) => hit.term);

      expect(terms).toEqual(["expiry", "otp", "credential request"]);
    });

    it("should detect time pressure and end phrases", () => {
      expect(patterns.hasTimePressure("Reply within 2 hours")).toBe(true);
      expect(patterns.hasTimePressure("Reply whenever")).toBe(false);
      expect(patterns.containsEndPhrase("ok bye")).toBe(true);
      expect(patterns.containsEndPhrase("bypass")).toBe(false);
    });

    it("should find keyword families near a span", () => {
      const text = "Transfer to account 123456789012";
      const [match] = patterns.match(text);

      expect(patterns.contextAround(text, match.span)).toEqual({
        account: true,
        contact: false,
        payment: true,
      });
    });
  });

  it("should reject an invalid vocabulary", () => {
    expect(() => PatternLibrary.compile({ categories: {} })).toThrow();
  });
});
