import { invalidRequest } from "../types/index.js";
import type { FineTuneJobSpec, HyperparameterValue } from "../types/index.js";
import type { HyperparameterRange, ProviderDescriptor } from "../registry/index.js";

function inRange(range: HyperparameterRange, value: HyperparameterValue): boolean {
  switch (range.type) {
    case "integer":
      return typeof value === "number" && Number.isInteger(value) && value >= range.min && value <= range.max;
    case "number":
      return typeof value === "number" && Number.isFinite(value) && value >= range.min && value <= range.max;
    case "enum":
      return range.values.includes(String(value));
  }
}

function describeRange(range: HyperparameterRange): string {
  return range.type === "enum"
    ? `one of ${range.values.join(", ")}`
    : `${range.type === "integer" ? "an integer" : "a number"} in [${range.min}, ${range.max}]`;
}

/**
 * Checks every hyperparameter against the ranges the provider declares.
 * Runs before the job is built, so a bad spec never reaches the provider.
 */
export function validateFineTuneSpec(spec: Readonly<FineTuneJobSpec>, descriptor: ProviderDescriptor): void {
  for (const [name, value] of Object.entries(spec.hyperparameters)) {
    const range = Object.hasOwn(descriptor.hyperparameters, name) ? descriptor.hyperparameters[name] : undefined;
    if (!range) {
      throw invalidRequest(`Unknown hyperparameter "${name}" for ${descriptor.id}`, {
        name,
        supported: Object.keys(descriptor.hyperparameters),
      });
    }
    if (!inRange(range, value)) {
      throw invalidRequest(`Hyperparameter "${name}" must be ${describeRange(range)}, got ${String(value)}`, {
        name,
        value,
      });
    }
  }
}
