export type CounselingErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "FORBIDDEN" | "CONFIGURATION_ERROR";

export type CounselingErrorDetails = Record<string, unknown>;

export class CounselingError extends Error {
  readonly code: CounselingErrorCode;
  readonly details?: CounselingErrorDetails;

  constructor(code: CounselingErrorCode, message: string, details?: CounselingErrorDetails) {
    super(message);
    this.name = "CounselingError";
    this.code = code;
    this.details = details;
  }
}

/** Malformed input, a broken reference between records, or a policy violation. */
export class ValidationError extends CounselingError {
  constructor(message: string, details?: CounselingErrorDetails) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends CounselingError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} ${id} not found.`, { entity, id });
    this.name = "NotFoundError";
  }
}

export class AccessDeniedError extends CounselingError {
  constructor(userEmail: string, action: string) {
    super("FORBIDDEN", `${userEmail} is not allowed to ${action.replace(/_/g, " ")}.`, { user_email: userEmail, action });
    this.name = "AccessDeniedError";
  }
}

/**
 * Template configuration an administrator wrote that cannot be applied. Reported to the
 * operator log; the user-facing action that hit it still goes through.
 */
export class ConfigurationError extends CounselingError {
  constructor(message: string, details?: CounselingErrorDetails) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }
}

export function isCounselingError(err: unknown): err is CounselingError {
  return err instanceof CounselingError;
}

/** Text tool result in the shape every tool handler returns. */
export function errorResult(err: unknown): { content: { type: "text"; text: string }[] } {
  if (isCounselingError(err)) {
    return { content: [{ type: "text", text: `Error: ${err.message}` }] };
  }
  console.error("[tool] Unexpected failure:", err);
  return { content: [{ type: "text", text: "Error: Unexpected failure, see server log." }] };
}
