/**
 * Refresh Scheduler
 *
 * Renews the token on a fixed interval and republishes the access token.
 * Fail-stop: the first failed refresh or write moves it to `stopped`
 * for good. Ticks are strictly sequential; the next timer is armed only
 * once the current tick has finished.
 *
 * Events: `refreshed` (AuthStatus) after each successful tick,
 * `stopped` (Error | undefined) once, when the scheduler halts.
 */

import { EventEmitter } from "node:events";
import { createLogger, type Logger } from "../logger.js";
import { DEFAULT_REFRESH_INTERVAL_MS } from "./config.js";
import type { CredentialStore } from "./credentialStore.js";
import { describeError, NotAuthenticatedError } from "./errors.js";
import type { OAuthClient } from "./oauthClient.js";
import { persistToken } from "./tokenFile.js";
import type { SchedulerState, SchedulerStats } from "./types.js";

export type RefreshSchedulerOptions = {
  store: CredentialStore;
  client: Pick<OAuthClient, "refresh">;
  tokenPath: string;
  intervalMs?: number;
  logger?: Logger;
  persist?: (accessToken: string, path: string) => Promise<void>;
  now?: () => number;
};

export class RefreshScheduler extends EventEmitter {
  private readonly store: CredentialStore;
  private readonly client: Pick<OAuthClient, "refresh">;
  private readonly tokenPath: string;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly persist: (accessToken: string, path: string) => Promise<void>;
  private readonly now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private state: SchedulerState = "idle";
  private ticks = 0;
  private refreshes = 0;
  private lastRefreshAt: number | null = null;
  private lastError: string | null = null;
  private readonly stopped: Promise<void>;
  private markStopped: () => void = () => undefined;

  constructor(options: RefreshSchedulerOptions) {
    super();
    this.store = options.store;
    this.client = options.client;
    this.tokenPath = options.tokenPath;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.logger = options.logger ?? createLogger("RefreshScheduler");
    this.persist = options.persist ?? persistToken;
    this.now = options.now ?? Date.now;
    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });
  }

  /**
   * Arms the first tick. Requires a token in the store; `signal` stops the
   * scheduler when aborted.
   */
  start(signal?: AbortSignal): void {
    if (this.state !== "idle") {
      this.logger.warn(`Already ${this.state}`);
      return;
    }
    if (!this.store.hasState()) throw new NotAuthenticatedError();

    this.state = "running";
    if (signal) {
      if (signal.aborted) {
        this.stop();
        return;
      }
      signal.addEventListener("abort", () => this.stop(), { once: true });
    }
    this.arm();
    this.logger.info(`Started (interval: ${this.intervalMs / 1000}s)`);
  }

  // Cancels the pending tick. A tick already in flight completes but is not re-armed.
  stop(): void {
    if (this.state === "stopped") return;
    this.clearTimer();
    this.state = "stopped";
    this.logger.info("Stopped");
    this.finish(undefined);
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  whenStopped(): Promise<void> {
    return this.stopped;
  }

  getStats(): SchedulerStats {
    return {
      state: this.state,
      ticks: this.ticks,
      refreshes: this.refreshes,
      lastRefreshAt: this.lastRefreshAt,
      lastError: this.lastError,
    };
  }

  private arm(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((err: unknown) => this.halt(err));
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    if (this.state !== "running") return;
    this.ticks++;

    try {
      const next = await this.client.refresh(this.store.identity, this.store.currentRefreshToken());
      this.store.replaceState(next);
      await this.persist(next.accessToken, this.tokenPath);
    } catch (err) {
      this.halt(err);
      return;
    }

    this.refreshes++;
    this.lastRefreshAt = this.now();
    this.logger.info(`Token refreshed (#${this.refreshes})`);
    this.emit("refreshed", this.store.getStatus());

    if (this.state === "running") this.arm();
  }

  private halt(err: unknown): void {
    if (this.state === "stopped") {
      this.logger.warn(`Refresh failed after stop: ${describeError(err)}`);
      return;
    }
    this.clearTimer();
    this.state = "stopped";
    this.lastError = describeError(err);
    this.logger.error(`Refresh failed, scheduler stopped: ${this.lastError}`);
    this.finish(err instanceof Error ? err : new Error(this.lastError));
  }

  private finish(err: Error | undefined): void {
    this.markStopped();
    this.emit("stopped", err);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
