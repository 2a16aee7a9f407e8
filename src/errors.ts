export enum ProvisionErrorCode {
  NOT_SUPERUSER = "NOT_SUPERUSER",
  USER_UNRESOLVED = "USER_UNRESOLVED",
  UPGRADE_FAILED = "UPGRADE_FAILED",
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProvisionErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.context = context;
  }
}
