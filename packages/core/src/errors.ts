export type ProvisionErrorCode =
  | "MISSING_PARAMETER"
  | "INVALID_PARAMETER"
  | "CONNECTION_FAILURE"
  | "PRIVILEGE_ESCALATION_FAILURE"
  | "STEP_EXECUTION_FAILURE";

export interface ProvisionErrorContext {
  parameter?: string;
  host?: string;
  step?: string;
  cause?: unknown;
}

/** Message of an unknown thrown value */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly parameter?: string;
  readonly host?: string;
  readonly step?: string;

  constructor(code: ProvisionErrorCode, message: string, context: ProvisionErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "ProvisionError";
    this.code = code;
    this.parameter = context.parameter;
    this.host = context.host;
    this.step = context.step;
  }

  static missingParameter(parameter: string): ProvisionError {
    return new ProvisionError("MISSING_PARAMETER", `This workflow requires ${parameter} to be set.`, { parameter });
  }

  static invalidParameter(parameter: string, reason: string): ProvisionError {
    return new ProvisionError("INVALID_PARAMETER", `Invalid value for ${parameter}: ${reason}`, { parameter });
  }

  static connectionFailure(host: string, cause: unknown): ProvisionError {
    return new ProvisionError("CONNECTION_FAILURE", `Could not connect to ${host}: ${describeError(cause)}`, {
      host,
      cause,
    });
  }

  static privilegeEscalationFailure(host: string, user: string, cause: unknown): ProvisionError {
    return new ProvisionError(
      "PRIVILEGE_ESCALATION_FAILURE",
      `Could not become ${user} on ${host}: ${describeError(cause)}`,
      { host, cause },
    );
  }

  static stepFailed(host: string, step: string, cause: unknown): ProvisionError {
    return new ProvisionError("STEP_EXECUTION_FAILURE", `Step "${step}" failed on ${host}: ${describeError(cause)}`, {
      host,
      step,
      cause,
    });
  }
}
