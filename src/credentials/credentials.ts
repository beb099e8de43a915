import type { CredentialShape } from "../registry/index.js";

/**
 * Opaque credential material. The core passes it along and never looks inside;
 * only a transport calls `apply` to decorate outgoing headers.
 */
export interface Credentials {
  readonly shape: CredentialShape;
  apply(headers: Readonly<Record<string, string>>): Record<string, string>;
}

/** Credentials, or a lookup run once the call has been routed. */
export type CredentialSource = Credentials | (() => Promise<Credentials>);

export interface CredentialProvider {
  /** Resolves credentials for a shape or throws CanonicalError(AuthError). */
  get(shape: CredentialShape, providerId: string): Promise<Credentials>;
}

function headerFor(shape: CredentialShape, secret: string): Record<string, string> {
  switch (shape) {
    case "api-key-header":
      return { "x-api-key": secret };
    case "bearer-token":
    case "oauth-access-token":
      return { Authorization: `Bearer ${secret}` };
  }
}

class SecretCredentials implements Credentials {
  readonly shape: CredentialShape;
  private readonly secret: string;

  constructor(shape: CredentialShape, secret: string) {
    this.shape = shape;
    this.secret = secret;
  }

  apply(headers: Readonly<Record<string, string>>): Record<string, string> {
    return { ...headers, ...headerFor(this.shape, this.secret) };
  }

  toJSON(): Record<string, string> {
    return { shape: this.shape };
  }
}

export function credentialsFromSecret(shape: CredentialShape, secret: string): Credentials {
  return new SecretCredentials(shape, secret);
}
