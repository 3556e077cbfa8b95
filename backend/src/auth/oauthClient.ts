import axios, { type AxiosInstance } from "axios";
import { Readable } from "node:stream";
import { z } from "zod";
import { createLogger, type Logger } from "../logger.js";
import {
  ConnectionError,
  MalformedResponseError,
  ResponseReadError,
  ServerDeclinedError,
} from "./errors.js";
import type { GrantType, Identity, ServerErrorBody, TokenResponse, TokenState } from "./types.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./config.js";

// Campos informativos inválidos são ignorados; só os tokens decidem o formato.
const serverErrorSchema = z.object({
  error: z.string().optional().catch(undefined),
  error_description: z.string().optional().catch(undefined),
});

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  token_type: z.string().optional().catch(undefined),
  expires_in: z.number().nonnegative().optional().catch(undefined),
  scope: z.string().optional().catch(undefined),
});

export type ParseOptions = {
  url: string;
  status: number;
  // Refresh grant: kept when the server does not rotate the refresh token.
  currentRefreshToken?: string;
  logger: Logger;
  now?: () => number;
};

/**
 * Turns a token endpoint body into a {@link TokenState}.
 *
 * An `error` field is only reported: the body is still probed for a token,
 * and a usable token wins over the reported error.
 */
export function parseTokenResponse(body: string, opts: ParseOptions): TokenState {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedResponseError(opts.url, opts.status, body === "" ? "empty body" : reason);
  }

  const srvErr = serverErrorSchema.safeParse(json);
  if (srvErr.success) reportServerError(srvErr.data, opts);

  const parsed = tokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    throw new MalformedResponseError(opts.url, opts.status, reason);
  }

  const tr: TokenResponse = parsed.data;
  const refreshToken = tr.refresh_token || opts.currentRefreshToken;
  if (!refreshToken) {
    throw new MalformedResponseError(opts.url, opts.status, "refresh_token: Required");
  }

  return {
    accessToken: tr.access_token,
    refreshToken,
    tokenType: tr.token_type || "bearer",
    expiresIn: tr.expires_in,
    obtainedAt: (opts.now ?? Date.now)(),
  };
}

function reportServerError(srvErr: ServerErrorBody, opts: ParseOptions) {
  if (!srvErr.error) return;
  const declined = new ServerDeclinedError(opts.url, srvErr.error, srvErr.error_description ?? "");
  opts.logger.warn(declined.message);
}

async function readBody(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export type OAuthClientOptions = {
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
  now?: () => number;
};

// Password grant e refresh grant contra o endpoint de token (form-urlencoded).
export class OAuthClient {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: OAuthClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("OAuthClient");
    this.now = options.now ?? Date.now;
  }

  // Troca usuário/senha -> tokens
  async authenticate(identity: Identity): Promise<TokenState> {
    const body = this.baseForm(identity, "password");
    body.set("username", identity.username);
    body.set("password", identity.password);
    return this.exchange(identity.tokenUrl, body);
  }

  // Renova com refresh_token
  async refresh(identity: Identity, currentRefreshToken: string): Promise<TokenState> {
    const body = this.baseForm(identity, "refresh_token");
    body.set("refresh_token", currentRefreshToken);
    return this.exchange(identity.tokenUrl, body, currentRefreshToken);
  }

  private baseForm(identity: Identity, grantType: GrantType): URLSearchParams {
    const body = new URLSearchParams();
    body.set("client_id", identity.clientId);
    body.set("client_secret", identity.clientSecret);
    body.set("grant_type", grantType);
    body.set("scope", identity.scope);
    return body;
  }

  private async exchange(url: string, body: URLSearchParams, currentRefreshToken?: string): Promise<TokenState> {
    let status: number;
    let data: unknown;
    try {
      const res = await this.http.post<unknown>(url, body.toString(), {
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        timeout: this.timeoutMs,
        responseType: "stream",
        // O status HTTP não decide nada; quem decide é o corpo.
        validateStatus: () => true,
      });
      status = res.status;
      data = res.data;
    } catch (err) {
      throw new ConnectionError(url, err);
    }

    let text: string;
    try {
      if (!(data instanceof Readable)) throw new Error("response body is not a stream");
      text = await readBody(data);
    } catch (err) {
      throw new ResponseReadError(url, err);
    }

    return parseTokenResponse(text, {
      url,
      status,
      currentRefreshToken,
      logger: this.logger,
      now: this.now,
    });
  }
}
