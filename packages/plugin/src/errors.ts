export type SyntaxEnableErrorCode = "host-missing";

export class SyntaxEnableError extends Error {
  readonly code: SyntaxEnableErrorCode;

  constructor(code: SyntaxEnableErrorCode, message: string) {
    super(message);
    this.name = "SyntaxEnableError";
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
