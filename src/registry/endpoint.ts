import { ConfigError } from "../config/errors.js";

const PLACEHOLDER = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

/** Fills `{name}` placeholders; every placeholder must have a value. */
export function renderEndpoint(template: string, vars: Readonly<Record<string, string>>): string {
  const rendered = template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined || value === "") {
      throw new ConfigError(`Endpoint variable "${name}" is required by "${template}"`);
    }
    return encodeURIComponent(value);
  });
  return rendered.replace(/\/+$/, "");
}

export function placeholdersOf(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((m) => m[1] ?? "");
}
