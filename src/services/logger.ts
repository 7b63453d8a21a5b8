import { pino, type Logger } from "pino";

export type ServiceLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export function createServiceLogger(level: LogLevel): Logger {
  return pino({ name: "triage-relay", level });
}
