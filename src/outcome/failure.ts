export type FailureReason = "task-failed" | "cancelled" | "budget-exceeded" | "invalid-suspension";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  /** The thrown value behind this failure, if any */
  error?: unknown;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    context: opts?.context,
    error: opts?.error,
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
