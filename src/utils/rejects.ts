export type RejectReason =
  | "invalid_topic"
  | "invalid_payload"
  | "invalid_fix"
  | "projection_error";

export class InvalidFixError extends Error {
  readonly code = "INVALID_FIX";

  constructor(message: string) {
    super(message);
    this.name = "InvalidFixError";
  }
}

/** A newer create or a clear landed while this route was being computed. */
export class RouteSupersededError extends Error {
  readonly code = "ROUTE_SUPERSEDED";

  constructor(message = "Route request superseded by a newer command") {
    super(message);
    this.name = "RouteSupersededError";
  }
}

export class RouteProjectionError extends Error {
  readonly code = "ROUTE_PROJECTION";

  constructor(message: string) {
    super(message);
    this.name = "RouteProjectionError";
  }
}

/** The engine answered but could not produce a usable route. */
export class RoutingEngineError extends Error {
  readonly code = "ROUTING_ENGINE_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "RoutingEngineError";
  }
}

/** Timeout, abort or transport failure talking to the engine. */
export class RoutingEngineUnavailableError extends Error {
  readonly code = "ROUTING_ENGINE_UNAVAILABLE";

  constructor(message: string) {
    super(message);
    this.name = "RoutingEngineUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyRejectReason(
  error: unknown,
): Exclude<RejectReason, "invalid_topic"> {
  if (error instanceof InvalidFixError) {
    return "invalid_fix";
  }

  if (error instanceof RouteProjectionError) {
    return "projection_error";
  }

  return "invalid_payload";
}

type RejectLogContext = {
  deviceId?: string;
  topic?: string;
  message?: string;
  timestamp?: number;
};

export function logRejectedMessage(
  reason: RejectReason,
  context: RejectLogContext,
): void {
  console.warn("[ingestion.reject]", {
    reason,
    deviceId: context.deviceId ?? null,
    topic: context.topic ?? null,
    message: context.message ?? null,
    timestamp: context.timestamp ?? Date.now(),
  });
}
