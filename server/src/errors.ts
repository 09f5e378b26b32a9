import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { logger } from "./logger";

export type ValidationErrorDetail = {
  field: string;
  message: string;
};

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: new Date().toISOString(),
    };
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Bad request") {
    super(message, "BAD_REQUEST", 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Authentication required") {
    super(message, "UNAUTHORIZED", 401);
  }
}

export class NotFoundError extends AppError {
  constructor(resourceType?: string, resourceId?: string) {
    const message = resourceType
      ? resourceId !== undefined
        ? `${resourceType} not found: ${resourceId}`
        : `${resourceType} not found`
      : "Resource not found";
    super(message, "NOT_FOUND", 404);
  }
}

export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(message = "Validation failed", errors: ValidationErrorDetail[] = []) {
    super(message, "VALIDATION_ERROR", 400);
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message = "Request body too large") {
    super(message, "PAYLOAD_TOO_LARGE", 413);
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(message = "Unsupported request body encoding") {
    super(message, "UNSUPPORTED_MEDIA_TYPE", 415);
  }
}

export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super(message, "INTERNAL_ERROR", 500);
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export const fromZodError = (error: ZodError): ValidationError =>
  new ValidationError(
    "Validation failed",
    error.issues.map((issue) => ({
      field: issue.path.join(".") || "body",
      message: issue.message,
    })),
  );

type BodyParserError = { status: number; type: string };

// body-parser raises http-errors carrying a 4xx status and a type such as "entity.too.large"
const isBodyParserError = (err: unknown): err is BodyParserError =>
  typeof err === "object" &&
  err !== null &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "type" in err &&
  typeof err.type === "string";

const fromBodyParserError = ({ status, type }: BodyParserError): AppError => {
  if (type === "entity.parse.failed") return new BadRequestError("Malformed JSON body");
  if (status === 413) return new PayloadTooLargeError();
  if (status === 415) return new UnsupportedMediaTypeError();
  return new AppError("Unreadable request body", "BAD_REQUEST", status);
};

export const normalizeError = (err: unknown): AppError => {
  if (err instanceof AppError) return err;
  if (err instanceof ZodError) return fromZodError(err);
  if (isBodyParserError(err)) return fromBodyParserError(err);
  return new InternalError();
};

export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError("Route", `${req.method} ${req.path}`));
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const appError = normalizeError(err);
  if (appError.statusCode >= 500) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  }
  res.status(appError.statusCode).json(appError.toJSON());
};
