export type UserFacingErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "ROOM_LIMIT"
  | "UNAVAILABLE"
  | "USER_ERROR";

export class UserFacingError extends Error {
  public readonly userMessage: string;
  public readonly code: UserFacingErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(params: {
    userMessage: string;
    code?: UserFacingErrorCode;
    debugMessage?: string;
    details?: Record<string, unknown>;
  }) {
    super(params.debugMessage ?? params.userMessage);
    this.name = "UserFacingError";
    this.userMessage = params.userMessage;
    this.code = params.code ?? "USER_ERROR";
    this.details = params.details;
  }
}

const STATUS_BY_CODE: Record<UserFacingErrorCode, number> = {
  VALIDATION: 400,
  USER_ERROR: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  ROOM_LIMIT: 429,
  UNAVAILABLE: 503,
};

export function statusCodeFor(error: UserFacingError): number {
  return STATUS_BY_CODE[error.code];
}
