// /src/lib/offers/errors.ts
import type { z } from "zod";
import type {
  EngineFailure,
  InputIssue,
  InvalidInputFailure,
} from "../../contracts";

export function issuesFromZod(err: z.ZodError): InputIssue[] {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

export function invalidInput(
  message: string,
  issues: InputIssue[] = [],
  offerId?: string,
): InvalidInputFailure {
  return {
    code: "INVALID_INPUT",
    message,
    issues,
    ...(offerId !== undefined ? { offerId } : {}),
  };
}

/**
 * Client-facing shape for route responses. Keeps the failure code as `reason`
 * so callers can branch without parsing the message.
 */
export function toClientError(failure: EngineFailure): {
  reason: EngineFailure["code"];
  message: string;
  state?: string;
  offerId?: string;
  issues?: InputIssue[];
} {
  if (failure.code === "UNKNOWN_STATE") {
    return { reason: failure.code, message: failure.message, state: failure.state };
  }

  return {
    reason: failure.code,
    message: failure.message,
    ...(failure.offerId !== undefined ? { offerId: failure.offerId } : {}),
    ...(failure.issues.length ? { issues: failure.issues } : {}),
  };
}
