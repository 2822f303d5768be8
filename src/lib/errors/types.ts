// errors/types.ts - Error types shared by the router and the profile handlers

import type { HttpMethod } from "../router.ts";

/**
 * Base error for the profiles application.
 * Carries what the error page needs: status, title and description.
 */
export class ProfilesError extends Error {
  /** HTTP status code for this error */
  readonly statusCode: number;
  /** User-facing title */
  readonly title: string;
  /** User-facing description */
  readonly description: string;
  readonly requestId?: string;

  constructor(
    message: string,
    statusCode: number,
    title: string,
    description: string,
    requestId?: string,
  ) {
    super(message);
    this.name = "ProfilesError";
    this.statusCode = statusCode;
    this.title = title;
    this.description = description;
    this.requestId = requestId;
  }
}

export type MissingResource = "profile" | "page";

export class NotFoundError extends ProfilesError {
  readonly resource: MissingResource;

  constructor(resource: MissingResource, detail?: string, requestId?: string) {
    const messages: Record<MissingResource, { title: string; description: string }> = {
      profile: {
        title: "Profile not found",
        description: "There is no member with that username.",
      },
      page: {
        title: "Page not found",
        description: "We couldn't find what you're looking for.",
      },
    };

    const { title, description } = messages[resource];
    super(`${resource} not found: ${detail ?? "unknown"}`, 404, title, description, requestId);
    this.name = "NotFoundError";
    this.resource = resource;
  }
}

export class ValidationError extends ProfilesError {
  /** The field that failed validation */
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, detail?: string, requestId?: string) {
    super(
      `Validation failed for ${field}: ${String(value)}`,
      400,
      "Invalid request",
      detail ?? `Invalid ${field} provided.`,
      requestId,
    );
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

export class ForbiddenError extends ProfilesError {
  constructor(detail?: string, requestId?: string) {
    super(
      `Forbidden: ${detail ?? "access denied"}`,
      403,
      "Forbidden",
      detail ?? "You need to be signed in to do that.",
      requestId,
    );
    this.name = "ForbiddenError";
  }
}

export class MethodNotAllowedError extends ProfilesError {
  readonly allowed: readonly HttpMethod[];

  constructor(method: string, allowed: readonly HttpMethod[], requestId?: string) {
    super(
      `Method ${method} not allowed`,
      405,
      "Method not allowed",
      `This page only accepts ${allowed.join(", ")}.`,
      requestId,
    );
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }
}

/**
 * Thrown while building the route table, e.g. for a duplicate route name.
 */
export class RouteConfigurationError extends ProfilesError {
  constructor(message: string) {
    super(message, 500, "Something went wrong", "The site is misconfigured.");
    this.name = "RouteConfigurationError";
  }
}

/**
 * Thrown when a route name and parameters cannot be turned back into a URL.
 */
export class NoReverseMatchError extends ProfilesError {
  readonly routeName: string;

  constructor(routeName: string, reason: string) {
    super(
      `Reverse for "${routeName}" failed: ${reason}`,
      500,
      "Something went wrong",
      "An unexpected error occurred. Please try again.",
    );
    this.name = "NoReverseMatchError";
    this.routeName = routeName;
  }
}

export function isProfilesError(error: unknown): error is ProfilesError {
  return error instanceof ProfilesError;
}

/**
 * Convert an unknown error to a ProfilesError.
 */
export function toProfilesError(error: unknown, requestId?: string): ProfilesError {
  if (isProfilesError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProfilesError(
    message,
    500,
    "Something went wrong",
    "An unexpected error occurred. Please try again.",
    requestId,
  );
}
