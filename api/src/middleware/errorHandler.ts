// Centralized error handling
import { Request, Response, NextFunction } from "express";

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: string | null;
  details: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    options?: { isOperational?: boolean; code?: string; details?: unknown }
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Exercise config or settings contradict themselves; has to be fixed upstream
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, { code: "config_error", details });
    this.name = "ConfigError";
  }
}

// The logged set itself is malformed
export class InputError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, { code: "input_error", details });
    this.name = "InputError";
  }
}

type Handler = (req: Request, res: Response, next: NextFunction) => unknown;

export const asyncHandler = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};

export type NodeEnv = "development" | "production" | "test";

export type ErrorResponse = {
  status: number;
  payload: Record<string, unknown>;
};

export function toErrorResponse(err: Error, nodeEnv: NodeEnv): ErrorResponse {
  if (err instanceof AppError) {
    const payload: Record<string, unknown> = { error: err.message };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    if (nodeEnv === "development" && err.stack) payload.stack = err.stack;
    return { status: err.statusCode, payload };
  }

  // body-parser rejects malformed JSON with a 400-typed SyntaxError
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return { status: 400, payload: { error: "Malformed JSON body", code: "invalid_json" } };
  }

  return {
    status: 500,
    payload: {
      error: nodeEnv === "production" ? "Internal server error" : err.message,
      ...(nodeEnv === "development" && { stack: err.stack }),
    },
  };
}

export const createErrorHandler =
  (nodeEnv: NodeEnv) => (err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (nodeEnv === "development") {
      console.error("Error:", err);
    } else {
      console.error("Error:", err.message);
    }

    const { status, payload } = toErrorResponse(err, nodeEnv);
    res.status(status).json(payload);
  };
