import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export type GatewayErrorCode = "INVALID_PARAMS" | "NOT_FOUND" | "INTERNAL_ERROR";

export interface GatewayError {
  code: GatewayErrorCode;
  message: string;
}

export type RespondFn = (ok: boolean, payload?: unknown, error?: GatewayError) => void;

/** Pushes an event to every connected client. */
export type BroadcastFn = (event: string, payload: unknown) => void;

export interface GatewayContext {
  broadcast: BroadcastFn;
}

export interface GatewayRequest {
  params: unknown;
  respond: RespondFn;
  context: GatewayContext;
}

export type GatewayRequestHandler = (request: GatewayRequest) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;

/**
 * Check request params against a schema. On mismatch responds
 * INVALID_PARAMS with the first problem and returns undefined.
 */
export function parseParams<S extends TSchema>(
  schema: S,
  params: unknown,
  respond: RespondFn,
): Static<S> | undefined {
  const value = params ?? {};
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  respond(false, undefined, {
    code: "INVALID_PARAMS",
    message: first ? `${first.path || "/"}: ${first.message}` : "Invalid params",
  });
  return undefined;
}

export function internalError(err: unknown): GatewayError {
  return { code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) };
}
