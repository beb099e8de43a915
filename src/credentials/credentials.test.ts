import { describe, it, expect } from "vitest";
import { credentialsFromSecret } from "./credentials.js";
import { EnvCredentialProvider, StaticCredentialProvider } from "./credential-providers.js";

describe("credentialsFromSecret", () => {
  it("sends bearer tokens in the Authorization header", () => {
    const creds = credentialsFromSecret("bearer-token", "test-secret");
    expect(creds.apply({ Accept: "application/json" })).toEqual({
      Accept: "application/json",
      Authorization: "Bearer test-secret",
    });
  });

  it("sends OAuth access tokens as bearer tokens", () => {
    expect(credentialsFromSecret("oauth-access-token", "test-token").apply({})).toEqual({
      Authorization: "Bearer test-token",
    });
  });

  it("sends API keys in x-api-key", () => {
    expect(credentialsFromSecret("api-key-header", "test-secret").apply({})).toEqual({ "x-api-key": "test-secret" });
  });

  it("does not leak the secret when serialised", () => {
    const creds = credentialsFromSecret("bearer-token", "test-secret");
    expect(JSON.stringify(creds)).toBe('{"shape":"bearer-token"}');
  });

  it("does not modify the headers it is given", () => {
    const headers = { Accept: "text/plain" };
    credentialsFromSecret("bearer-token", "test-secret").apply(headers);
    expect(headers).toEqual({ Accept: "text/plain" });
  });
});

describe("EnvCredentialProvider", () => {
  it("reads the configured variable", async () => {
    const provider = new EnvCredentialProvider({ openai: "OPENAI_KEY" }, { OPENAI_KEY: " test-secret \n" });
    const creds = await provider.get("bearer-token", "openai");
    expect(creds.shape).toBe("bearer-token");
    expect(creds.apply({})).toEqual({ Authorization: "Bearer test-secret" });
  });

  it("fails with AuthError when no variable is configured", async () => {
    const provider = new EnvCredentialProvider({}, {});
    await expect(provider.get("bearer-token", "openai")).rejects.toMatchObject({
      kind: "AuthError",
      message: 'No credential variable configured for "openai"',
    });
  });

  it("fails with AuthError when the variable is unset or blank", async () => {
    const provider = new EnvCredentialProvider({ openai: "OPENAI_KEY" }, { OPENAI_KEY: "  " });
    await expect(provider.get("bearer-token", "openai")).rejects.toMatchObject({
      kind: "AuthError",
      payload: { variable: "OPENAI_KEY" },
    });
  });
});

describe("StaticCredentialProvider", () => {
  it("returns credentials of the requested shape", async () => {
    const provider = new StaticCredentialProvider({ anthropic: "test-secret" });
    const creds = await provider.get("api-key-header", "anthropic");
    expect(creds.apply({})).toEqual({ "x-api-key": "test-secret" });
  });

  it("fails with AuthError for an unknown provider", async () => {
    const provider = new StaticCredentialProvider({});
    await expect(provider.get("bearer-token", "openai")).rejects.toMatchObject({ kind: "AuthError" });
  });
});
