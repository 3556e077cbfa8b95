import { createLogger, type Logger } from "../logger.js";
import type { AppConfig } from "./config.js";
import { CredentialStore } from "./credentialStore.js";
import { OAuthClient } from "./oauthClient.js";
import { RefreshScheduler } from "./refreshScheduler.js";
import { persistToken } from "./tokenFile.js";
import type { AuthStatus, SchedulerStats } from "./types.js";

export { authRouter } from "./router.js";
export { loadConfig, type AppConfig } from "./config.js";
export * from "./errors.js";

export type TokenKeeperDeps = {
  client?: Pick<OAuthClient, "authenticate" | "refresh">;
  persist?: (accessToken: string, path: string) => Promise<void>;
  logger?: Logger;
  signal?: AbortSignal;
};

export type TokenKeeper = {
  store: CredentialStore;
  scheduler: RefreshScheduler;
  getStatus(): AuthStatus & { scheduler: SchedulerStats };
  stop(): void;
};

/**
 * Password grant, first write of the token file, then hands renewal over to
 * the scheduler. Rejects without writing anything if the first exchange fails.
 */
export async function startTokenKeeper(config: AppConfig, deps: TokenKeeperDeps = {}): Promise<TokenKeeper> {
  const logger = deps.logger ?? createLogger("TokenKeeper");
  const client = deps.client ?? new OAuthClient({ timeoutMs: config.requestTimeoutMs, logger });
  const persist = deps.persist ?? persistToken;
  const store = new CredentialStore(config.identity);

  store.replaceState(await client.authenticate(store.identity));
  await persist(store.currentAccessToken(), config.tokenPath);
  logger.info(`Authenticated as ${store.identity.username}; token written to ${config.tokenPath}`);

  const scheduler = new RefreshScheduler({
    store,
    client,
    tokenPath: config.tokenPath,
    intervalMs: config.refreshIntervalMs,
    logger,
    persist,
  });
  scheduler.start(deps.signal);

  return {
    store,
    scheduler,
    getStatus: () => ({ ...store.getStatus(), scheduler: scheduler.getStats() }),
    stop: () => scheduler.stop(),
  };
}
