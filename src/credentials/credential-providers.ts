import { CanonicalError } from "../types/index.js";
import type { CredentialShape } from "../registry/index.js";
import { credentialsFromSecret } from "./credentials.js";
import type { CredentialProvider, Credentials } from "./credentials.js";

/** Reads a secret per provider from the environment variable named in config. */
export class EnvCredentialProvider implements CredentialProvider {
  private readonly variables: Readonly<Record<string, string>>;
  private readonly env: NodeJS.ProcessEnv;

  constructor(variables: Readonly<Record<string, string>>, env: NodeJS.ProcessEnv = process.env) {
    this.variables = variables;
    this.env = env;
  }

  async get(shape: CredentialShape, providerId: string): Promise<Credentials> {
    const variable = this.variables[providerId];
    if (!variable) {
      throw new CanonicalError("AuthError", `No credential variable configured for "${providerId}"`, {
        provider: providerId,
      });
    }
    const secret = this.env[variable];
    if (!secret || secret.trim() === "") {
      throw new CanonicalError("AuthError", `Environment variable "${variable}" is not set`, {
        provider: providerId,
        payload: { variable },
      });
    }
    return credentialsFromSecret(shape, secret.trim());
  }
}

/** Fixed secrets per provider id, for tests and embedded use. */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly secrets: ReadonlyMap<string, string>;

  constructor(secrets: Readonly<Record<string, string>>) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async get(shape: CredentialShape, providerId: string): Promise<Credentials> {
    const secret = this.secrets.get(providerId);
    if (secret === undefined) {
      throw new CanonicalError("AuthError", `No credentials for "${providerId}"`, { provider: providerId });
    }
    return credentialsFromSecret(shape, secret);
  }
}
