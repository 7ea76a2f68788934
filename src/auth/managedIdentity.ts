import { ManagedIdentityCredential } from "@azure/identity";
import type { Authenticator, Credential } from "./credentialProvider";

export const POSTGRES_TOKEN_SCOPE = "https://ossrdbms-aad.database.windows.net/.default";

/**
 * Exchanges an Azure managed identity for an Azure Database for PostgreSQL access token.
 */
export class ManagedIdentityAuthenticator implements Authenticator {
  private readonly credential: ManagedIdentityCredential;

  constructor(clientId: string, private readonly scope = POSTGRES_TOKEN_SCOPE) {
    this.credential = new ManagedIdentityCredential({ clientId });
  }

  async getToken(): Promise<Credential> {
    const accessToken = await this.credential.getToken(this.scope);
    if (!accessToken) {
      throw new Error(`Managed identity returned no token for scope ${this.scope}`);
    }
    return {
      token: accessToken.token,
      expiresOn: new Date(accessToken.expiresOnTimestamp),
    };
  }
}
