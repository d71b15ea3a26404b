import type { Principal } from "@marketlens/shared";

export interface Authenticator {
  /** Resolves null when the credential is missing or not recognised. */
  authenticate(credential: string | undefined): Promise<Principal | null>;
}

/** Bearer tokens mapped to principals, as configured under `auth.tokens`. */
export class StaticTokenAuthenticator implements Authenticator {
  private readonly tokens: Map<string, Principal>;

  constructor(tokens: Record<string, Principal>) {
    this.tokens = new Map(Object.entries(tokens));
  }

  get size(): number {
    return this.tokens.size;
  }

  async authenticate(credential: string | undefined): Promise<Principal | null> {
    if (credential === undefined || credential.length === 0) return null;
    return this.tokens.get(credential) ?? null;
  }
}

/**
 * Pull the credential from `?token=` or an `Authorization: Bearer` header.
 * The header wins when both are present.
 */
export function extractCredential(url: string | undefined, authorization: string | undefined): string | undefined {
  if (authorization !== undefined) {
    const match = authorization.match(/^Bearer\s+(\S+)$/i);
    if (match?.[1]) return match[1];
  }
  if (url !== undefined) {
    const token = new URL(url, "http://localhost").searchParams.get("token");
    if (token) return token;
  }
  return undefined;
}
