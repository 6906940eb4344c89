export type LedgerClientErrorCode =
  | "NOT_CONNECTED"
  | "NO_ACCOUNT"
  | "UNSUPPORTED_CHAIN"
  | "INVALID_ADDRESS"
  | "INVALID_CALLDATA"
  | "INVALID_VALUE"
  | "SUBMISSION_FAILED"
  | "TIMEOUT";

export class LedgerClientError extends Error {
  public readonly code: LedgerClientErrorCode;

  constructor(code: LedgerClientErrorCode, message: string) {
    super(message);
    this.name = "LedgerClientError";
    this.code = code;
  }
}
