import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { createLogger } from "./logger";

const log = createLogger("ErrorHandler");

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  code = "VALIDATION";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = "NOT_FOUND";
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * A file exists but could not be read as the expected format
 * (broken zip, missing package part, malformed XML).
 */
export class ParseError extends Error implements AppError {
  statusCode = 422;
  code = "PARSE_FAILURE";
  isOperational = true;
  filePath: string;
  constructor(filePath: string, detail: string) {
    super(`Could not parse ${filePath}: ${detail}`);
    this.name = "ParseError";
    this.filePath = filePath;
  }
}

export class OutOfRangeError extends Error implements AppError {
  statusCode = 400;
  code = "OUT_OF_RANGE";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "OutOfRangeError";
  }
}

export class NotIndexedError extends Error implements AppError {
  statusCode = 409;
  code = "NOT_INDEXED";
  isOperational = true;
  constructor(message = "Slide library has not been indexed yet; call index() first") {
    super(message);
    this.name = "NotIndexedError";
  }
}

export class NotActiveError extends Error implements AppError {
  statusCode = 409;
  code = "NOT_ACTIVE";
  isOperational = true;
  constructor(message = "No active deck; create a blank deck or open a template first") {
    super(message);
    this.name = "NotActiveError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export interface HandleRouteErrorOptions {
  correlationId?: string;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
  options?: HandleRouteErrorOptions,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  if (options?.correlationId) {
    res.status(statusCode).json({ error: message, correlationId: options.correlationId });
  } else {
    res.status(statusCode).json({ error: message });
  }
}

export function logError(context: string, error: unknown): void {
  log.error(`[${context}] ${getErrorMessage(error)}`, error);
}

/**
 * Node filesystem errors carry a string `code` such as ENOENT or EACCES.
 */
export function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    "syscall" in error
  );
}
