import { describe, it, expect } from "vitest";
import { validateFineTuneSpec } from "./fine-tune-validation.js";
import { defineProvider } from "../registry/index.js";
import type { FineTuneJobSpec, HyperparameterValue } from "../types/index.js";

const DESCRIPTOR = defineProvider({
  id: "tuner",
  operations: ["fine_tune"],
  streaming: false,
  credentialShape: "bearer-token",
  endpointTemplate: "https://tuner.test/v1",
  hyperparameters: {
    epochs: { type: "integer", min: 1, max: 10 },
    learning_rate_multiplier: { type: "number", min: 0.1, max: 2 },
    adapter_size: { type: "enum", values: ["4", "8"] },
  },
});

function spec(hyperparameters: Record<string, HyperparameterValue>): FineTuneJobSpec {
  return { dataset: "file-1", base_model: "base", hyperparameters };
}

describe("validateFineTuneSpec", () => {
  it("accepts values inside every declared range", () => {
    expect(() =>
      validateFineTuneSpec(spec({ epochs: 10, learning_rate_multiplier: 0.1, adapter_size: 8 }), DESCRIPTOR),
    ).not.toThrow();
  });

  it("accepts a spec without hyperparameters", () => {
    expect(() => validateFineTuneSpec(spec({}), DESCRIPTOR)).not.toThrow();
  });

  it("rejects a hyperparameter the provider does not declare", () => {
    expect(() => validateFineTuneSpec(spec({ warmup: 1 }), DESCRIPTOR)).toThrow(
      expect.objectContaining({ kind: "InvalidRequest", message: 'Unknown hyperparameter "warmup" for tuner' }),
    );
  });

  it("does not treat inherited keys as declared", () => {
    expect(() => validateFineTuneSpec(spec({ toString: 1 }), DESCRIPTOR)).toThrow('Unknown hyperparameter "toString"');
  });

  it.each([
    [{ epochs: 0 }, 'Hyperparameter "epochs" must be an integer in [1, 10], got 0'],
    [{ epochs: 2.5 }, 'Hyperparameter "epochs" must be an integer in [1, 10], got 2.5'],
    [{ learning_rate_multiplier: 3 }, 'Hyperparameter "learning_rate_multiplier" must be a number in [0.1, 2], got 3'],
    [{ learning_rate_multiplier: "fast" }, 'Hyperparameter "learning_rate_multiplier" must be a number in [0.1, 2], got fast'],
    [{ adapter_size: "2" }, 'Hyperparameter "adapter_size" must be one of 4, 8, got 2'],
  ])("rejects %j", (hyperparameters, message) => {
    expect(() => validateFineTuneSpec(spec(hyperparameters), DESCRIPTOR)).toThrow(
      expect.objectContaining({ kind: "InvalidRequest", message }),
    );
  });
});
