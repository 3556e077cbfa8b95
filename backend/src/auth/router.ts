import { Router } from "express";
import type { AuthStatus, SchedulerStats } from "./types.js";

export type StatusSource = {
  getStatus(): AuthStatus & { scheduler: SchedulerStats };
};

// GET /auth/status → estado do token e do agendador (sem tokens nem segredos)
export function authRouter(source: StatusSource): Router {
  const router = Router();

  router.get("/status", (_req, res) => {
    const { authenticated, tokenType, expiresIn, obtainedAt, scheduler } = source.getStatus();
    return res.json({
      ok: true,
      authenticated,
      token_type: tokenType ?? null,
      expires_in: expiresIn ?? null,
      obtained_at: obtainedAt ? new Date(obtainedAt).toISOString() : null,
      scheduler: {
        state: scheduler.state,
        ticks: scheduler.ticks,
        refreshes: scheduler.refreshes,
        last_refresh_at: scheduler.lastRefreshAt ? new Date(scheduler.lastRefreshAt).toISOString() : null,
        last_error: scheduler.lastError,
      },
    });
  });

  return router;
}
