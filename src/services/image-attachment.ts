export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp" | "image/bmp";

export type DecodedImage = {
  mimeType: ImageMimeType;
  base64: string;
  byteLength: number;
};

export type ImageDecodeResult = { ok: true; image: DecodedImage } | { ok: false; reason: string };

const SIGNATURES: Array<{ mimeType: ImageMimeType; matches: (bytes: Uint8Array) => boolean }> = [
  {
    mimeType: "image/png",
    matches: (bytes) =>
      startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  { mimeType: "image/jpeg", matches: (bytes) => startsWith(bytes, [0xff, 0xd8, 0xff]) },
  { mimeType: "image/gif", matches: (bytes) => startsWith(bytes, [0x47, 0x49, 0x46, 0x38]) },
  {
    mimeType: "image/webp",
    matches: (bytes) =>
      startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes.subarray(8), [0x57, 0x45, 0x42, 0x50]),
  },
  { mimeType: "image/bmp", matches: (bytes) => startsWith(bytes, [0x42, 0x4d]) && bytes.length > 14 },
];

function startsWith(bytes: Uint8Array, prefix: number[]): boolean {
  if (bytes.length < prefix.length) {
    return false;
  }
  return prefix.every((value, index) => bytes[index] === value);
}

export function decodeImage(bytes: Uint8Array): ImageDecodeResult {
  if (bytes.length === 0) {
    return { ok: false, reason: "image payload is empty" };
  }
  const signature = SIGNATURES.find((candidate) => candidate.matches(bytes));
  if (!signature) {
    return { ok: false, reason: `unrecognized image format (${bytes.length} bytes)` };
  }
  return {
    ok: true,
    image: {
      mimeType: signature.mimeType,
      base64: Buffer.from(bytes).toString("base64"),
      byteLength: bytes.length,
    },
  };
}
