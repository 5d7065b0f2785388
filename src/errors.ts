import type { ErrorStatus } from "./types.js";

/** Short labels shown in the status bar for each terminal error */
export const ERROR_LABELS: Record<ErrorStatus, string> = {
  no_credentials: "No Creds",
  token_expired: "Token Exp",
  refresh_failed: "Refresh Err",
  auth_error: "Auth Err",
  network_error: "Net Err",
};

export class UsageError extends Error {
  status: ErrorStatus;
  constructor(status: ErrorStatus, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node fs errors carry a string `code` such as ENOENT or EEXIST */
export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
