// Static identity of the account, fixed for the lifetime of the process.
export type Identity = {
  tokenUrl: string;
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
  scope: string;
};

export type TokenState = {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiresIn?: number; // seconds, informational only
  obtainedAt: number; // epoch millis
};

export type TokenResponse = {
  access_token: string;
  refresh_token?: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
};

export type ServerErrorBody = {
  error?: string;
  error_description?: string;
};

export type GrantType = "password" | "refresh_token";

export type AuthStatus = {
  authenticated: boolean;
  tokenType?: string;
  expiresIn?: number;
  obtainedAt?: number;
};

export type SchedulerState = "idle" | "running" | "stopped";

export type SchedulerStats = {
  state: SchedulerState;
  ticks: number;
  refreshes: number;
  lastRefreshAt: number | null;
  lastError: string | null;
};
