/**
 * Authorizers produce the Authorization header for Connect requests.
 *
 * The login flow that obtains tokens is outside this package; callers
 * hand the client a token or a refresh callback.
 */

export interface Authorizer {
  /** Full header value (e.g. "Bearer …"), or null to send no header */
  getAuthorizationHeader(): Promise<string | null>;
  /** Called once after a 401/403; may refresh credentials */
  handleMissingAuthorization(): Promise<void>;
}

/** Fixed bearer token; a rejected token stays rejected */
export class StaticTokenAuthorizer implements Authorizer {
  constructor(private readonly accessToken: string) {}

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.accessToken}`;
  }

  async handleMissingAuthorization(): Promise<void> {
    // No way to obtain a new token
  }
}

/** Bearer token that is replaced by calling `refresh` when rejected */
export class RefreshingTokenAuthorizer implements Authorizer {
  private accessToken: string;

  constructor(
    initialToken: string,
    private readonly refresh: () => Promise<string>
  ) {
    this.accessToken = initialToken;
  }

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.accessToken}`;
  }

  async handleMissingAuthorization(): Promise<void> {
    this.accessToken = await this.refresh();
  }
}

/** Sends no Authorization header */
export class NullAuthorizer implements Authorizer {
  async getAuthorizationHeader(): Promise<null> {
    return null;
  }

  async handleMissingAuthorization(): Promise<void> {}
}
