/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ProtocolService } from "../services/protocol-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The node's composition root (set once for the whole app) */
    service: ProtocolService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}
