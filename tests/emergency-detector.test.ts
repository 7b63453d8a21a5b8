import { describe, expect, it } from "vitest";
import { URGENT_PHRASES, detectEmergency } from "../src/services/emergency-detector.js";

describe("emergency keyword detector", () => {
  it("matches urgent phrases case-insensitively", () => {
    const scan = detectEmergency("Sudden CHEST PAIN after climbing stairs");
    expect(scan.urgent).toBe(true);
    expect(scan.matched).toEqual(["chest pain"]);
  });

  it("returns matches in the fixed list order, not text order", () => {
    const scan = detectEmergency("had a seizure, now unconscious and chest pain");
    expect(scan.matched).toEqual(["chest pain", "unconscious", "seizure"]);
  });

  it("treats typographic apostrophes like plain ones", () => {
    expect(detectEmergency("I can’t breathe properly").matched).toEqual(["can't breathe"]);
  });

  it("flags every configured phrase", () => {
    for (const phrase of URGENT_PHRASES) {
      expect(detectEmergency(`patient reports ${phrase} today`).urgent).toBe(true);
    }
  });

  it("returns an empty match set for routine complaints", () => {
    expect(detectEmergency("mild headache since yesterday")).toEqual({ urgent: false, matched: [] });
  });
});
