// Tracker error types.
//
// Contract:
// - Routes answer a rejected request with { ok: false, errors } and the carried status.
// - Engine conditions (ineligible dates, stale years, gaps) are events, not errors.

import type { ZodIssue } from "zod";

export type TrackerErrorCode =
  | "INVALID_BODY"
  | "UNKNOWN_SEASON"
  | "DAY_NOT_COMPLETED"
  | "DAY_ALREADY_PROCESSED"
  | "INGEST_DISABLED"
  | "INVALID_CONFIG";

export type TrackerErrorV1 = {
  code: TrackerErrorCode;
  path: string;
  message: string;
};

export class TrackerRequestRejected extends Error {
  public readonly status: number;
  public readonly errors: TrackerErrorV1[];

  constructor(status: number, errors: TrackerErrorV1[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "TrackerRequestRejected";
    this.status = status;
    this.errors = errors;
  }
}

export class TrackerConfigInvalid extends Error {
  public readonly errors: TrackerErrorV1[];

  constructor(source: string, errors: TrackerErrorV1[]) {
    super(`INVALID_CONFIG: ${source}: ${errors.map((e) => `${e.path || "(root)"} ${e.message}`).join("; ")}`);
    this.name = "TrackerConfigInvalid";
    this.errors = errors;
  }
}

export function issuesToErrors(code: TrackerErrorCode, issues: ZodIssue[], prefix = ""): TrackerErrorV1[] {
  return issues.map((i) => ({
    code,
    path: [prefix, ...i.path.map(String)].filter(Boolean).join("."),
    message: i.message,
  }));
}
