import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import type { ServiceLogger } from "./logger.js";

export const CONSENT_VALIDITY_DAYS = 365;
const DAY_MS = 24 * 60 * 60 * 1000;

export type AuditEvent = {
  kind: "audit";
  timestamp: string;
  action: string;
  request_id: string;
  user_hash: string;
  status: string;
};

export type ConsentRecord = {
  kind: "consent";
  consent_id: string;
  user_hash: string;
  consent_type: string;
  consent_given: boolean;
  timestamp: string;
  ip_address: "anonymized";
  expires_at: string;
};

export type LedgerEntry = AuditEvent | ConsentRecord;

export type RecordAuditParams = {
  action: string;
  requestId: string;
  userData?: Record<string, unknown>;
  status: string;
  now?: Date;
};

export type RecordConsentParams = {
  consentId: string;
  userId: string;
  consentType: string;
  consentGiven: boolean;
  now?: Date;
};

/** Append-only. Nothing reads entries back over HTTP. */
export type ComplianceLedger = {
  readonly backend: "memory" | "file";
  recordAudit: (params: RecordAuditParams) => AuditEvent;
  recordConsent: (params: RecordConsentParams) => ConsentRecord;
};

export type MemoryComplianceLedger = ComplianceLedger & {
  entries: () => readonly LedgerEntry[];
};

type CanonicalJsonValue =
  | string
  | number
  | boolean
  | null
  | CanonicalJsonValue[]
  | {
      [key: string]: CanonicalJsonValue;
    };

function normalizeCanonicalValue(value: unknown): CanonicalJsonValue | undefined {
  if (value === null) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalizeCanonicalValue(item) ?? null);
  }
  if (typeof value === "object") {
    const objectValue = value as Record<string, unknown>;
    const normalized: Record<string, CanonicalJsonValue> = {};
    const keys = Object.keys(objectValue).sort((left, right) => left.localeCompare(right));
    for (const key of keys) {
      const next = normalizeCanonicalValue(objectValue[key]);
      if (next !== undefined) {
        normalized[key] = next;
      }
    }
    return normalized;
  }
  return undefined;
}

export function canonicalizePayload(payload: unknown): string {
  return JSON.stringify(normalizeCanonicalValue(payload) ?? null);
}

export function hashIdentifier(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex").slice(0, 16);
}

function buildAuditEvent(params: RecordAuditParams): AuditEvent {
  const now = params.now ?? new Date();
  return {
    kind: "audit",
    timestamp: now.toISOString(),
    action: params.action,
    request_id: params.requestId,
    user_hash: hashIdentifier(canonicalizePayload(params.userData ?? {})),
    status: params.status,
  };
}

function buildConsentRecord(params: RecordConsentParams): ConsentRecord {
  const now = params.now ?? new Date();
  return {
    kind: "consent",
    consent_id: params.consentId,
    user_hash: hashIdentifier(params.userId),
    consent_type: params.consentType,
    consent_given: params.consentGiven,
    timestamp: now.toISOString(),
    ip_address: "anonymized",
    expires_at: new Date(now.getTime() + CONSENT_VALIDITY_DAYS * DAY_MS).toISOString(),
  };
}

function logEntry(logger: ServiceLogger, entry: LedgerEntry): void {
  const label = entry.kind === "audit" ? "AUDIT" : "CONSENT";
  logger.info(`[triage] ${label}: ${JSON.stringify(entry)}`);
}

export function createMemoryComplianceLedger(logger: ServiceLogger): MemoryComplianceLedger {
  const stored: LedgerEntry[] = [];
  const append = <T extends LedgerEntry>(entry: T): T => {
    stored.push(entry);
    logEntry(logger, entry);
    return entry;
  };

  return {
    backend: "memory",
    recordAudit: (params) => append(buildAuditEvent(params)),
    recordConsent: (params) => append(buildConsentRecord(params)),
    entries: () => [...stored],
  };
}

export function createFileComplianceLedger(params: { filePath: string; logger: ServiceLogger }): ComplianceLedger {
  const { logger } = params;
  const filePath = path.resolve(params.filePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const append = <T extends LedgerEntry>(entry: T): T => {
    logEntry(logger, entry);
    try {
      fs.appendFileSync(filePath, `${JSON.stringify(entry)}\n`, "utf8");
    } catch (error) {
      logger.warn(`[triage] ledger append failed: file=${filePath} error=${String(error)}`);
    }
    return entry;
  };

  return {
    backend: "file",
    recordAudit: (auditParams) => append(buildAuditEvent(auditParams)),
    recordConsent: (consentParams) => append(buildConsentRecord(consentParams)),
  };
}
