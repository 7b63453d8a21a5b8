import { describe, expect, it } from "vitest";
import { anonymizeText } from "../src/services/anonymizer.js";

describe("anonymizer", () => {
  it("replaces a bare ten-digit phone number", () => {
    expect(anonymizeText("call me on 9876543210 please")).toBe("call me on [PHONE] please");
  });

  it("replaces dashed and dotted phone numbers", () => {
    expect(anonymizeText("home 555-123-4567, work 555.765.4321")).toBe("home [PHONE], work [PHONE]");
  });

  it("replaces email addresses", () => {
    expect(anonymizeText("write to patient.one@example.org today")).toBe("write to [EMAIL] today");
  });

  it("leaves short numbers such as temperatures alone", () => {
    expect(anonymizeText("fever of 102 for 3 days")).toBe("fever of 102 for 3 days");
  });
});
