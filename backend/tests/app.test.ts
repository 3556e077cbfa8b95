import axios from "axios";
import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../src/app.js";
import type { StatusSource } from "../src/auth/router.js";

async function serve(source: StatusSource): Promise<{ server: Server; base: string }> {
  const server = await new Promise<Server>((resolve) => {
    const s = createApp(source).listen(0, "127.0.0.1", () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("no TCP address");
  return { server, base: `http://127.0.0.1:${addr.port}` };
}

describe("status app", () => {
  let server: Server | undefined;

  afterEach(async () => {
    if (!server) return;
    const s = server;
    server = undefined;
    s.closeAllConnections();
    await new Promise<void>((resolve) => s.close(() => resolve()));
  });

  it("answers /health", async () => {
    const started = await serve({
      getStatus: () => ({
        authenticated: false,
        scheduler: { state: "idle", ticks: 0, refreshes: 0, lastRefreshAt: null, lastError: null },
      }),
    });
    server = started.server;

    const { data } = await axios.get(`${started.base}/health`);

    expect(data).toEqual({ ok: true });
  });

  it("reports token and scheduler state without secrets", async () => {
    const started = await serve({
      getStatus: () => ({
        authenticated: true,
        tokenType: "bearer",
        expiresIn: 599,
        obtainedAt: Date.UTC(2026, 0, 1, 12, 0, 0),
        scheduler: {
          state: "stopped",
          ticks: 3,
          refreshes: 2,
          lastRefreshAt: Date.UTC(2026, 0, 1, 12, 18, 0),
          lastError: "Could not connect to http://auth.test/oauth/token: timeout of 15000ms exceeded",
        },
      }),
    });
    server = started.server;

    const { data } = await axios.get(`${started.base}/auth/status`);

    expect(data).toEqual({
      ok: true,
      authenticated: true,
      token_type: "bearer",
      expires_in: 599,
      obtained_at: "2026-01-01T12:00:00.000Z",
      scheduler: {
        state: "stopped",
        ticks: 3,
        refreshes: 2,
        last_refresh_at: "2026-01-01T12:18:00.000Z",
        last_error: "Could not connect to http://auth.test/oauth/token: timeout of 15000ms exceeded",
      },
    });
  });

  it("reports an unauthenticated keeper with nulls", async () => {
    const started = await serve({
      getStatus: () => ({
        authenticated: false,
        scheduler: { state: "idle", ticks: 0, refreshes: 0, lastRefreshAt: null, lastError: null },
      }),
    });
    server = started.server;

    const { data } = await axios.get(`${started.base}/auth/status`);

    expect(data).toMatchObject({
      authenticated: false,
      token_type: null,
      expires_in: null,
      obtained_at: null,
      scheduler: { state: "idle", last_refresh_at: null },
    });
  });
});
