// ---------------------------------------------------------------------------
// Circulation routes: checkout, return and renewal.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Context } from "hono";
import { z } from "zod";

import type { CirculationEngine } from "../../circulation/circulation-engine.js";
import type { CopyId, LoanId, ReaderId } from "../../core/types.js";
import { requireActor } from "../middleware/actor.js";
import type { AppEnv } from "../env.js";
import { IdParam, readJsonBody, validate } from "../validation.js";

/** Dependencies required by loan routes. */
export interface LoanRouteDeps {
  engine: CirculationEngine;
}

const CheckoutSchema = z.object({
  readerId: IdParam,
  copyId: IdParam,
});

function loanIdOf(c: Context<AppEnv>): LoanId {
  return validate(IdParam, c.req.param("id"), "loan id") as LoanId;
}

/**
 * Mounts circulation endpoints:
 *
 * - `POST /loans`            -- Check a copy out to a reader (201).
 * - `POST /loans/:id/return` -- Close an open loan.
 * - `POST /loans/:id/renew`  -- Extend an open loan by one loan period.
 */
export function loanRoutes(deps: LoanRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/", async (c) => {
    const actor = requireActor(c);
    const body = await readJsonBody(c, CheckoutSchema);

    const receipt = await deps.engine.checkout(
      body.readerId as ReaderId,
      body.copyId as CopyId,
      actor,
    );
    return c.json(receipt, 201);
  });

  app.post("/:id/return", async (c) => {
    const actor = requireActor(c);
    const receipt = await deps.engine.returnLoan(loanIdOf(c), actor);
    return c.json(receipt);
  });

  app.post("/:id/renew", async (c) => {
    const actor = requireActor(c);
    const receipt = await deps.engine.renew(loanIdOf(c), actor);
    return c.json(receipt);
  });

  return app;
}
