import { describe, expect, it } from "vitest";
import { decodeImage } from "../src/services/image-attachment.js";

function withPadding(prefix: number[], total = 24): Uint8Array {
  const bytes = new Uint8Array(total);
  bytes.set(prefix);
  return bytes;
}

describe("decodeImage", () => {
  it.each([
    ["image/png", [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
    ["image/jpeg", [0xff, 0xd8, 0xff, 0xe0]],
    ["image/gif", [0x47, 0x49, 0x46, 0x38, 0x39, 0x61]],
    ["image/webp", [0x52, 0x49, 0x46, 0x46, 0x10, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50]],
    ["image/bmp", [0x42, 0x4d]],
  ])("recognises %s by its leading bytes", (mimeType, prefix) => {
    const result = decodeImage(withPadding(prefix));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.image.mimeType).toBe(mimeType);
      expect(result.image.byteLength).toBe(24);
    }
  });

  it("base64-encodes the original bytes", () => {
    const bytes = withPadding([0xff, 0xd8, 0xff], 6);
    const result = decodeImage(bytes);

    expect(result).toEqual({
      ok: true,
      image: { mimeType: "image/jpeg", base64: Buffer.from(bytes).toString("base64"), byteLength: 6 },
    });
  });

  it("rejects a RIFF container that is not WEBP", () => {
    const result = decodeImage(withPadding([0x52, 0x49, 0x46, 0x46, 0x10, 0x00, 0x00, 0x00, 0x41, 0x56, 0x49, 0x20]));
    expect(result).toEqual({ ok: false, reason: "unrecognized image format (24 bytes)" });
  });

  it("rejects empty and unknown payloads", () => {
    expect(decodeImage(new Uint8Array())).toEqual({ ok: false, reason: "image payload is empty" });
    expect(decodeImage(Uint8Array.from([0x25, 0x50, 0x44, 0x46]))).toEqual({
      ok: false,
      reason: "unrecognized image format (4 bytes)",
    });
  });
});
