import { buildReport, collectIntelligence, FanoutReporter, Reporter } from "../src/report";
import { IntelligenceReport } from "../src/types";
import { RecordingReporter, sessionWith, turn, verdict } from "./fixtures";

function scamSession() {
  const scammer = {
    ...turn("scammer", "Congratulations! Pay to winner@ybl or call +91 98765 43210"),
    matchedTerms: ["congratulations", "pay"],
  };
  const followUp = { ...turn("scammer", "pay fast"), matchedTerms: ["pay"] };
  const session = sessionWith(
    [scammer, turn("agent", "kaun?"), followUp, turn("agent", "achha")],
    [
      { kind: "phone", value: "+919876543210", firstSeenTurn: 0, confidence: 0.9 },
      { kind: "upi", value: "winner@ybl", firstSeenTurn: 0, confidence: 0.95 },
      { kind: "url", value: "https://bit.ly/x1", firstSeenTurn: 2, confidence: 0.85 },
    ]
  );
  session.verdictTrend.push(verdict(["lottery"], 0.7022), verdict(["payment-request"], 0.45));
  session.agentNotes.push("first note", "Scam type: payment-request. Message #3. Score 0.45");
  session.channel = "SMS";
  return session;
}

describe("buildReport", () => {
  it("should snapshot the session into a report", () => {
    const report = buildReport(scamSession(), "engagement_complete", 0);

    expect(report.report_id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(report.sessionId).toBe("session-1");
    expect(report.reason).toBe("engagement_complete");
    expect(report.scamDetected).toBe(true);
    expect(report.maxScore).toBe(0.7022);
    expect(report.categories).toEqual(["lottery", "payment-request"]);
    expect(report.totalMessagesExchanged).toBe(4);
    expect(report.verdictTrend).toHaveLength(2);
    expect(report.reported_at).toBe("1970-01-01T00:00:00.000Z");
  });

  it("should fill the legacy intelligence lists", () => {
    const report = buildReport(scamSession(), "payment_identifier", 0);

    expect(report.extractedIntelligence).toEqual({
      bankAccounts: [],
      upiIds: ["winner@ybl"],
      phishingLinks: ["https://bit.ly/x1"],
      phoneNumbers: ["+919876543210"],
      suspiciousKeywords: ["congratulations", "pay"],
    });
  });

  it("should order entities by the turn they were first seen", () => {
    const report = buildReport(scamSession(), "payment_identifier", 0);

    expect(report.entities.map((e) => e.value)).toEqual([
      "+919876543210",
      "winner@ybl",
      "https://bit.ly/x1",
    ]);
  });

  it("should summarise the engagement in the agent notes", () => {
    const report = buildReport(scamSession(), "engagement_complete", 0);

    expect(report.agentNotes).toBe(
      "Scam categories: lottery, payment-request. Max score: 70%. Total messages: 4. Channel: SMS. " +
        "Intelligence gathered: 1 UPI IDs, 1 phone numbers, 1 links. " +
        "Last agent note: Scam type: payment-request. Message #3. Score 0.45"
    );
  });

  it("should not modify the session", () => {
    const session = scamSession();
    const report = buildReport(session, "high_confidence", 0);
    report.verdictTrend[0].categories.push("tampered");

    expect(session.verdictTrend[0].categories).toEqual(["lottery"]);
  });

  it("should report an empty session with no intelligence", () => {
    const report = buildReport(sessionWith([]), "session_expired", 0);

    expect(report.scamDetected).toBe(false);
    expect(report.maxScore).toBe(0);
    expect(collectIntelligence(sessionWith([])).suspiciousKeywords).toEqual([]);
    expect(report.agentNotes).toBe("Max score: 0%. Total messages: 0");
  });
});

describe("FanoutReporter", () => {
  it("should deliver to every sink even when one fails", async () => {
    const healthy = new RecordingReporter();
    const broken: Reporter = {
      report: () => Promise.reject(new Error("sink down")),
    };
    const fanout = new FanoutReporter([broken, healthy]);
    const report: IntelligenceReport = buildReport(scamSession(), "payment_identifier", 0);

    await expect(fanout.report(report)).resolves.toBeUndefined();
    expect(healthy.reports).toEqual([report]);
  });
});
