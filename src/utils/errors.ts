import type { Logger } from "pino";

export type SchedulingErrorCode =
  | "PAST_DATE"
  | "INVALID_RANGE"
  | "OUTSIDE_WORKING_HOURS"
  | "DOUBLE_BOOKING"
  | "INVALID_TRANSITION"
  | "TERMINAL_STATE"
  | "NOT_FOUND"
  | "VALIDATION"
  | "DUPLICATE"
  | "SCHEDULE_OVERLAP"
  | "SCHEDULE_IN_USE"
  | "SERVICE_GAP"
  | "INTERNAL";

export interface SchedulingError {
  code: SchedulingErrorCode;
  message: string;
  retryable: boolean;
}

export type Result<T> = { ok: true; data: T } | { ok: false; error: SchedulingError };

/**
 * A business-rule rejection. Thrown inside a store transaction so the store
 * rolls back, then turned into a failed {@link Result} at the operation boundary.
 */
export class SchedulingRejection extends Error {
  readonly code: Exclude<SchedulingErrorCode, "INTERNAL">;

  constructor(code: Exclude<SchedulingErrorCode, "INTERNAL">, message: string) {
    super(message);
    this.name = "SchedulingRejection";
    this.code = code;
  }
}

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function fail<T>(
  code: Exclude<SchedulingErrorCode, "INTERNAL">,
  message: string,
): Result<T> {
  return { ok: false, error: { code, message, retryable: false } };
}

export function toFailure<T>(error: unknown, logger: Logger, operation: string): Result<T> {
  if (error instanceof SchedulingRejection) {
    return fail(error.code, error.message);
  }
  logger.error({ err: error, operation }, "scheduling operation failed");
  return {
    ok: false,
    error: {
      code: "INTERNAL",
      message: "Temporary storage failure, please retry",
      retryable: true,
    },
  };
}

/** Runs an operation, converting thrown rejections and storage failures into a Result. */
export async function runOperation<T>(
  logger: Logger,
  operation: string,
  work: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await work());
  } catch (error) {
    return toFailure<T>(error, logger, operation);
  }
}
