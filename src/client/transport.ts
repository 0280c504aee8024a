// This file defines the transport capability the client depends on but does not implement.

/**
 * Sends one serialized JSON-RPC message and resolves with the raw reply.
 *
 * The reply may be text, an already-parsed JSON value, or `null`/`undefined`
 * when the peer sends no body. Transport failures are the transport's to
 * surface; the client lets them propagate unchanged.
 */
export interface Transport {
  send(message: string): Promise<unknown>;
}
