// ---------------------------------------------------------------------------
// Hono environment shared by the middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { ActorContext } from "../core/types.js";

export type AppEnv = {
  Variables: {
    requestId: string;
    logger: pino.Logger;
    /** `null` when the request carried no actor headers. */
    actor: ActorContext | null;
  };
};
