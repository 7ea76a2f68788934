import { AuthRenewalError } from "../errors/AppError";
import { logInfo, logWarn } from "../observability/logger";
import { withTimeout } from "../utils/withTimeout";

export type Credential = {
  token: string;
  expiresOn: Date;
};

/**
 * Any bearer-credential source usable in place of a database password.
 */
export interface Authenticator {
  getToken(): Promise<Credential>;
}

export type CredentialProviderOptions = {
  renewalMarginMs?: number;
  timeoutMs?: number;
  now?: () => Date;
};

export const DEFAULT_RENEWAL_MARGIN_MS = 5 * 60 * 1000;

/**
 * Caches one short-lived credential in memory and renews it ahead of expiry.
 *
 * Concurrent callers that find the credential stale share a single in-flight renewal.
 */
export class CredentialProvider {
  private credential: Credential | null = null;
  private inFlight: Promise<Credential> | null = null;
  private readonly renewalMarginMs: number;
  private readonly timeoutMs: number | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly authenticator: Authenticator,
    options: CredentialProviderOptions = {}
  ) {
    this.renewalMarginMs = options.renewalMarginMs ?? DEFAULT_RENEWAL_MARGIN_MS;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  isValid(now: Date = this.now()): boolean {
    if (!this.credential) {
      return false;
    }
    return now.getTime() < this.credential.expiresOn.getTime() - this.renewalMarginMs;
  }

  /**
   * Fetches a fresh credential from the authenticator, joining a renewal already under way.
   */
  acquire(): Promise<Credential> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const renewal = this.fetch().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = renewal;
    return renewal;
  }

  /**
   * Returns the current token, renewing first when it is missing or inside the renewal margin.
   */
  async ensureValid(): Promise<string> {
    if (this.credential && this.isValid()) {
      return this.credential.token;
    }
    const credential = await this.acquire();
    return credential.token;
  }

  /**
   * Returns the cached token without checking the margin, acquiring only when none is cached yet.
   */
  async currentToken(): Promise<string> {
    if (this.credential) {
      return this.credential.token;
    }
    return this.ensureValid();
  }

  private async fetch(): Promise<Credential> {
    const renewing = this.credential !== null;
    let credential: Credential;
    try {
      credential = await withTimeout(this.authenticator.getToken(), this.timeoutMs, "credential acquisition");
    } catch (error) {
      throw new AuthRenewalError(
        renewing ? "Database credential renewal failed." : "Database credential acquisition failed.",
        { cause: error }
      );
    }
    this.credential = credential;
    if (!this.isValid()) {
      logWarn("db_credential_short_lived", {
        expiresOn: credential.expiresOn.toISOString(),
        renewalMarginMs: this.renewalMarginMs,
      });
    }
    logInfo(renewing ? "db_credential_renewed" : "db_credential_acquired", {
      expiresOn: credential.expiresOn.toISOString(),
    });
    return credential;
  }
}
