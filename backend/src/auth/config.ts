import type { Identity } from "./types.js";

// Lê e valida o ambiente uma única vez, com defaults seguros.
export type AppConfig = {
  identity: Identity;
  tokenPath: string;
  refreshIntervalMs: number;
  requestTimeoutMs: number;
  port: number; // 0 = sem servidor de status
};

type Env = Record<string, string | undefined>;

export const DEFAULT_TOKEN_URL = "https://auth.tado.com/oauth/token";
export const DEFAULT_CLIENT_ID = "public-api-preview";
export const DEFAULT_SCOPE = "home.user";
export const DEFAULT_TOKEN_PATH = "/tmp/bearer.dat";
// Tokens expiram em 10 min; renova a cada 9.
export const DEFAULT_REFRESH_INTERVAL_MS = 9 * 60 * 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;
export const DEFAULT_PORT = 10000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const req = (name: string) => {
    const v = env[name];
    if (!v) throw new ConfigError(`Env '${name}' ausente`);
    return v;
  };

  const int = (name: string, fallback: number, min: number) => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const m = raw.trim().match(/^\d+$/);
    const n = m ? Number(m[0]) : NaN;
    if (!Number.isSafeInteger(n) || n < min) {
      throw new ConfigError(`Env '${name}' inválida: ${raw}`);
    }
    return n;
  };

  // Aceita OAUTH_SCOPE ou OAUTH_SCOPES (lista separada por vírgula ou espaço)
  const scopeRaw = env.OAUTH_SCOPE || env.OAUTH_SCOPES || DEFAULT_SCOPE;
  const scope = scopeRaw
    .split(/[,\s]+/)
    .filter(Boolean)
    .join(" ");

  const identity: Identity = Object.freeze({
    tokenUrl: env.OAUTH_TOKEN_URL || DEFAULT_TOKEN_URL,
    username: req("OAUTH_USERNAME"),
    password: req("OAUTH_PASSWORD"),
    clientId: env.OAUTH_CLIENT_ID || DEFAULT_CLIENT_ID,
    clientSecret: req("OAUTH_CLIENT_SECRET"),
    scope: scope || DEFAULT_SCOPE,
  });

  return {
    identity,
    tokenPath: env.TOKEN_PATH || DEFAULT_TOKEN_PATH,
    refreshIntervalMs: int("REFRESH_INTERVAL_MS", DEFAULT_REFRESH_INTERVAL_MS, 1),
    requestTimeoutMs: int("REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1),
    port: int("PORT", DEFAULT_PORT, 0),
  };
}
