export type AppErrorCode = "bad_request" | "route_unavailable" | "internal_error";

export class AppError extends Error {
  readonly status: number;
  readonly code: AppErrorCode;

  constructor(message: string, status: number, code: AppErrorCode) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "bad_request");
  }
}

/** The routing provider failed or found no route; nothing downstream can run. */
export class RouteUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 502, "route_unavailable");
  }
}

export const safeErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message;
  return JSON.stringify(error);
};
