import { describe, it, expect } from "vitest";
import { EvidenceParser, parseEvidence } from "../rca/evidence-parser";

describe("parseEvidence", () => {
  describe("empty input", () => {
    it.each([
      ["empty string", ""],
      ["whitespace", "   "],
      ["null", null],
      ["undefined", undefined],
    ])("should return empty evidence for %s", (_, input) => {
      expect(parseEvidence(input)).toEqual({ serviceName: "", operation: "", rawMatch: "" });
    });

    it("should return empty evidence when no rule matches", () => {
      expect(parseEvidence("something went wrong")).toEqual({
        serviceName: "",
        operation: "",
        rawMatch: "",
      });
    });
  });

  describe("serviceName= rule", () => {
    it("should read quoted service and span names", () => {
      expect(parseEvidence('serviceName="checkout" spanName="POST /cart"')).toEqual({
        serviceName: "checkout",
        operation: "POST /cart",
        rawMatch: 'serviceName="checkout"',
      });
    });

    it("should read JSON-style keys", () => {
      expect(parseEvidence('{"serviceName":"cart","operation":"AddItem"}')).toEqual({
        serviceName: "cart",
        operation: "AddItem",
        rawMatch: 'serviceName":"cart"',
      });
    });

    it("should win over a dotted token elsewhere in the text", () => {
      const parsed = parseEvidence("serviceName=checkout payment.Timeout");
      expect(parsed.serviceName).toBe("checkout");
      expect(parsed.operation).toBe("");
    });
  });

  describe("service= rule", () => {
    it("should read a bare value and op key", () => {
      expect(parseEvidence("service=inventory op=Reserve")).toEqual({
        serviceName: "inventory",
        operation: "Reserve",
        rawMatch: "service=inventory",
      });
    });
  });

  describe("service.Operation rule", () => {
    it("should split a bare dotted token", () => {
      expect(parseEvidence("payment.Timeout")).toEqual({
        serviceName: "payment",
        operation: "Timeout",
        rawMatch: "payment.Timeout",
      });
    });

    it("should find the token inside a sentence", () => {
      const parsed = parseEvidence("timeout calling payment.Charge after 3s");
      expect(parsed.serviceName).toBe("payment");
      expect(parsed.operation).toBe("Charge");
    });

    it("should skip file names", () => {
      const parsed = parseEvidence("error in handler.ts: payment.Timeout");
      expect(parsed.rawMatch).toBe("payment.Timeout");
    });
  });

  describe("[service] rule", () => {
    it("should read a bracketed prefix", () => {
      expect(parseEvidence("[inventory] stock check failed")).toEqual({
        serviceName: "inventory",
        operation: "",
        rawMatch: "[inventory]",
      });
    });

    it("should ignore log level tags", () => {
      expect(parseEvidence("[ERROR] something broke").serviceName).toBe("");
    });
  });
});

describe("EvidenceParser", () => {
  it("should apply custom rules in order", () => {
    const parser = new EvidenceParser([
      {
        name: "svc:",
        apply: (text) =>
          text.startsWith("svc:")
            ? { serviceName: text.slice(4), operation: "", rawMatch: text }
            : null,
      },
    ]);

    expect(parser.parse("svc:billing").serviceName).toBe("billing");
    expect(parser.parse("payment.Timeout").serviceName).toBe("");
  });

  it("should return a fresh object for empty input", () => {
    const parser = new EvidenceParser();
    const first = parser.parse("");
    first.serviceName = "mutated";
    expect(parser.parse("").serviceName).toBe("");
  });
});
