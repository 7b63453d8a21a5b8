import type { ZodIssue } from "zod";

export class InputError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "InputError";
    this.details = details;
  }
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(provider: string, message: string, status: number | null = null) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export class ConfigurationError extends Error {
  constructor(message = "Service configuration is invalid.") {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name || "Error", message: error.message };
  }
  return { type: typeof error, message: String(error) };
}

export function formatZodIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}
