import { ZodError, type ZodIssue } from "zod";

interface ApiErrorOptions {
  code?: string;
  cause?: unknown;
}

/**
 * Base class for every error the gateway raises on purpose.
 *
 * Subclasses fix the HTTP status; `type` is what callers see in the
 * `{ error: { message, type, code } }` body.
 */
export abstract class ApiError extends Error {
  abstract readonly statusCode: number;
  readonly code: string | undefined;

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }

  get type(): string {
    return this.name;
  }
}

// ===== Configuration / routing =====

/** Missing or invalid backend configuration, e.g. no credentials */
export class ConfigurationError extends ApiError {
  readonly statusCode = 500;
}

/** No provider or Strategy serves the requested model id */
export class ModelNotFoundError extends ApiError {
  readonly statusCode = 404;
}

/** A feature (tools, tool_choice) the selected provider cannot honour */
export class UnsupportedFeatureError extends ApiError {
  readonly statusCode = 400;
}

export class RequestValidationError extends ApiError {
  readonly statusCode = 422;
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message, { code: "invalid_request" });
    this.issues = issues;
  }

  static fromZodError(prefix: string, error: ZodError): RequestValidationError {
    return new RequestValidationError(
      `${prefix}: ${formatZodIssues(error.issues)}`,
      error.issues,
    );
  }
}

// ===== Provider client errors =====

export class APIConnectionError extends ApiError {
  readonly statusCode = 503;
}

export class AuthenticationError extends ApiError {
  readonly statusCode = 401;
}

export class RateLimitError extends ApiError {
  readonly statusCode = 429;
}

/** The provider rejected the request as malformed */
export class APIRequestError extends ApiError {
  readonly statusCode = 400;
}

export class APIServerError extends ApiError {
  readonly statusCode = 502;
}

/** The provider answered, but with an empty or malformed result container */
export class LLMIntegrationError extends ApiError {
  readonly statusCode = 502;
}

export class StreamingError extends ApiError {
  readonly statusCode = 500;
}

// ===== Mapping =====

export interface ErrorResponse {
  statusCode: number;
  body: {
    error: {
      message: string;
      type: string;
      code: string | null;
    };
  };
}

export function formatZodIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Map any thrown value to the status and body returned on the blocking path
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ApiError) {
    return {
      statusCode: error.statusCode,
      body: {
        error: {
          message: error.message,
          type: error.type,
          code: error.code ?? null,
        },
      },
    };
  }

  if (error instanceof ZodError) {
    return toErrorResponse(
      RequestValidationError.fromZodError("Invalid request", error),
    );
  }

  return {
    statusCode: 500,
    body: {
      error: {
        message:
          error instanceof Error
            ? `An unexpected error occurred: ${error.message}`
            : "An unexpected error occurred",
        type: "InternalServerError",
        code: null,
      },
    },
  };
}

/**
 * Terminal SSE frame emitted once a stream has already started
 */
export function toStreamErrorFrame(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const type =
    error instanceof ApiError
      ? error.type
      : error instanceof Error
        ? error.name
        : "Error";
  return `data: ${JSON.stringify({
    error: { message: `Streaming error: ${message}`, type },
  })}\n\n`;
}
