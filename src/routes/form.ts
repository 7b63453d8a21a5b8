import type { Context } from "hono";
import { z } from "zod";
import { InputError, formatZodIssues } from "../errors.js";
import type { ImageSource } from "../pipeline/triage-orchestrator.js";

type FormValue = string | File | (string | File)[];
export type FormBody = Record<string, FormValue>;

const TRUTHY = new Set(["true", "1", "yes", "on"]);
const FALSY = new Set(["false", "0", "no", "off", ""]);

export const formBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUTHY.has(value) || FALSY.has(value), { message: "expected a boolean value" })
  .transform((value) => TRUTHY.has(value));

export const optionalFormText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export async function readForm(c: Context): Promise<FormBody> {
  try {
    return await c.req.parseBody();
  } catch (error) {
    throw new InputError("Request body must be multipart/form-data or application/x-www-form-urlencoded.", [
      String(error),
    ]);
  }
}

export function parseFields<T extends z.ZodTypeAny>(schema: T, body: FormBody): z.infer<T> {
  const result = schema.safeParse(body);
  if (result.success) {
    return result.data;
  }
  throw new InputError("Invalid form fields.", formatZodIssues(result.error.issues));
}

function isFile(value: FormValue | undefined): value is File {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toImageSource(value: FormValue | undefined): ImageSource | null {
  if (!isFile(value) || value.size === 0) {
    return null;
  }
  return {
    read: async () => new Uint8Array(await value.arrayBuffer()),
  };
}
