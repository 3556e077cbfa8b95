import { NotAuthenticatedError } from "./errors.js";
import type { AuthStatus, Identity, TokenState } from "./types.js";

// Estado em memória: identidade fixa + último token válido (sem histórico).
export class CredentialStore {
  readonly identity: Readonly<Identity>;
  private state: Readonly<TokenState> | undefined;

  constructor(identity: Identity) {
    this.identity = Object.freeze({ ...identity });
  }

  hasState(): boolean {
    return this.state !== undefined;
  }

  currentState(): Readonly<TokenState> {
    if (!this.state) throw new NotAuthenticatedError();
    return this.state;
  }

  currentAccessToken(): string {
    return this.currentState().accessToken;
  }

  currentRefreshToken(): string {
    return this.currentState().refreshToken;
  }

  // Troca o valor inteiro; nunca altera campos do estado anterior.
  replaceState(next: TokenState): void {
    this.state = Object.freeze({ ...next });
  }

  getStatus(): AuthStatus {
    if (!this.state) return { authenticated: false };
    return {
      authenticated: true,
      tokenType: this.state.tokenType,
      expiresIn: this.state.expiresIn,
      obtainedAt: this.state.obtainedAt,
    };
  }
}
