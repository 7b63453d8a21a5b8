import { describe, expect, it, vi } from "vitest";
import type { GenerateContentParameters } from "@google/genai";
import { TriageReplySchema, createAiTriageClient } from "../src/services/ai-triage-client.js";
import { createRecordingLogger } from "./helpers.js";

const PNG_BYTES = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

function createClient(generate: (request: GenerateContentParameters) => Promise<{ text?: string }>, timeoutMs = 1_000) {
  const generateMock = vi.fn(generate);
  const logger = createRecordingLogger();
  const client = createAiTriageClient({ model: "gemini-test", timeoutMs, generate: generateMock, logger });
  return { client, generateMock, logger };
}

describe("ai triage client", () => {
  it("returns the three reply fields from a well-formed JSON response", async () => {
    const { client, generateMock } = createClient(async () => ({
      text: JSON.stringify({ risk: "LOW", doctor_summary: "Mild cold symptoms.", advice: "Rest and fluids." }),
    }));

    const outcome = await client.callTriage("runny nose since yesterday");

    expect(outcome).toEqual({
      ok: true,
      reply: { risk: "LOW", doctor_summary: "Mild cold symptoms.", advice: "Rest and fluids." },
      missingFields: [],
    });
    const request = generateMock.mock.calls[0][0];
    expect(request.model).toBe("gemini-test");
    expect(request.config?.responseMimeType).toBe("application/json");
    expect(request.config?.responseJsonSchema).toBe(TriageReplySchema);
    expect(request.config?.temperature).toBe(1);
    expect(request.config?.maxOutputTokens).toBe(8192);
    expect(request.config?.abortSignal).toBeInstanceOf(AbortSignal);
  });

  it("sends the instruction block followed by the patient symptoms", async () => {
    const { client, generateMock } = createClient(async () => ({ text: "{}" }));

    await client.callTriage("dry cough at night");

    expect(generateMock.mock.calls[0][0].contents).toEqual([
      {
        role: "user",
        parts: [{ text: expect.stringMatching(/\n\nPatient Symptoms:\ndry cough at night$/) }],
      },
    ]);
  });

  it("reports missing fields and only keeps string values", async () => {
    const { client, logger } = createClient(async () => ({ text: JSON.stringify({ risk: 3, advice: "See a GP." }) }));

    const outcome = await client.callTriage("knee pain after running");

    expect(outcome).toEqual({
      ok: true,
      reply: { advice: "See a GP." },
      missingFields: ["risk", "doctor_summary"],
    });
    expect(logger.lines.some((line) => line.startsWith("warn ") && line.endsWith("risk, doctor_summary"))).toBe(true);
  });

  it("flags an empty body", async () => {
    const { client } = createClient(async () => ({ text: "   " }));

    expect(await client.callTriage("itchy rash on arm")).toEqual({
      ok: false,
      kind: "empty_response",
      error: "Empty response from AI",
      rawError: "Response text was empty or None",
    });
  });

  it("flags a missing body", async () => {
    const { client } = createClient(async () => ({}));

    const outcome = await client.callTriage("itchy rash on arm");

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.kind).toBe("empty_response");
  });

  it("keeps the first 500 characters of an unparseable body", async () => {
    const body = `not json ${"x".repeat(600)}`;
    const { client } = createClient(async () => ({ text: body }));

    const outcome = await client.callTriage("sore throat for two days");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.kind).toBe("parse_failure");
      expect(outcome.error).toBe("Failed to parse AI response as JSON");
      expect(outcome.rawText).toBe(body.slice(0, 500));
      expect(outcome.rawText).toHaveLength(500);
    }
  });

  it("treats a JSON array as a parse failure", async () => {
    const { client } = createClient(async () => ({ text: "[1, 2]" }));

    expect(await client.callTriage("sore throat for two days")).toEqual({
      ok: false,
      kind: "parse_failure",
      error: "Failed to parse AI response as JSON",
      rawError: "Response JSON was not an object",
      rawText: "[1, 2]",
    });
  });

  it("converts a provider exception into an error outcome", async () => {
    const { client } = createClient(async () => {
      throw new RangeError("quota exhausted");
    });

    expect(await client.callTriage("back pain when bending")).toEqual({
      ok: false,
      kind: "provider_exception",
      error: "Failed to fetch the details",
      rawError: "quota exhausted",
      exceptionType: "RangeError",
    });
  });

  it("contains a synchronous throw without leaving the timer armed", async () => {
    const rejections: unknown[] = [];
    const onRejection = (reason: unknown) => {
      rejections.push(reason);
    };
    process.on("unhandledRejection", onRejection);
    try {
      const { client } = createClient(() => {
        throw new TypeError("socket hang up");
      }, 30);

      const outcome = await client.callTriage("fever and chills");
      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(outcome).toEqual({
        ok: false,
        kind: "provider_exception",
        error: "Failed to fetch the details",
        rawError: "socket hang up",
        exceptionType: "TypeError",
      });
      expect(rejections).toEqual([]);
    } finally {
      process.off("unhandledRejection", onRejection);
    }
  });

  it("gives up once the timeout elapses", async () => {
    let signal: AbortSignal | undefined;
    const { client } = createClient(
      (request) =>
        new Promise(() => {
          signal = request.config?.abortSignal;
        }),
      20,
    );

    const outcome = await client.callTriage("tired all the time");

    expect(outcome).toEqual({
      ok: false,
      kind: "provider_exception",
      error: "Failed to fetch the details",
      rawError: "AI request timed out after 20ms",
      exceptionType: "TimeoutError",
    });
    expect(signal?.aborted).toBe(true);
  });

  it("attaches a recognised image as inline data", async () => {
    const { client, generateMock } = createClient(async () => ({ text: "{}" }));

    await client.callTriage("rash on the forearm", PNG_BYTES);

    const parts = generateMock.mock.calls[0][0].contents;
    expect(parts).toEqual([
      {
        role: "user",
        parts: [
          { text: expect.any(String) },
          { inlineData: { mimeType: "image/png", data: Buffer.from(PNG_BYTES).toString("base64") } },
        ],
      },
    ]);
  });

  it("drops an unrecognised image and continues with text only", async () => {
    const { client, generateMock, logger } = createClient(async () => ({ text: "{}" }));

    await client.callTriage("rash on the forearm", Uint8Array.from([1, 2, 3, 4]));

    expect(generateMock.mock.calls[0][0].contents).toEqual([{ role: "user", parts: [{ text: expect.any(String) }] }]);
    expect(
      logger.lines.some((line) => line.includes("image decode failed (unrecognized image format (4 bytes))")),
    ).toBe(true);
  });
});

describe("triage reply schema", () => {
  it("constrains risk to the three assessed levels", () => {
    expect(TriageReplySchema.properties.risk.enum).toEqual(["LOW", "MODERATE", "HIGH"]);
    expect(TriageReplySchema.required).toEqual(["risk", "doctor_summary", "advice"]);
  });
});
