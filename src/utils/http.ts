import type { Request, Response } from "express";
import { parsePositiveInt } from "./core";
import type { Result, SchedulingErrorCode } from "./errors";

export function getString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function getOptionalString(value: unknown): string | undefined {
  const text = getString(value);
  return text.length ? text : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

/** JSON numbers pass through; numeric strings are parsed; anything else is NaN. */
export function getNumber(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    return Number(value);
  }
  return Number.NaN;
}

export function getPagination(
  pageRaw: unknown,
  pageSizeRaw: unknown,
): { page: number; pageSize: number } {
  return {
    page: parsePositiveInt(pageRaw, 1, 10_000),
    pageSize: parsePositiveInt(pageSizeRaw, 20, 100),
  };
}

export function getActor(req: Request): string | undefined {
  return getOptionalString(req.header("x-actor-id"));
}

const statusByCode: Record<SchedulingErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  INVALID_RANGE: 400,
  PAST_DATE: 400,
  OUTSIDE_WORKING_HOURS: 409,
  DOUBLE_BOOKING: 409,
  INVALID_TRANSITION: 409,
  TERMINAL_STATE: 409,
  DUPLICATE: 409,
  SCHEDULE_OVERLAP: 409,
  SCHEDULE_IN_USE: 409,
  SERVICE_GAP: 409,
  INTERNAL: 503,
};

export function httpStatusFor(code: SchedulingErrorCode): number {
  return statusByCode[code];
}

export function sendResult<T>(res: Response, result: Result<T>, successStatus = 200): void {
  if (result.ok) {
    res.status(successStatus).json(result.data);
    return;
  }
  res.status(httpStatusFor(result.error.code)).json({
    error: result.error.message,
    code: result.error.code,
  });
}
