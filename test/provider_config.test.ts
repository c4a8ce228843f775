import { describe, it, expect } from "vitest";
import { selectModel } from "../src/providers/provider_config";

describe("selectModel", () => {
  it("uses lane defaults when no overrides are set", () => {
    expect(selectModel({ env: {} })).toEqual({ model: "gpt-4o-mini", source: "default", lane: "local" });
    expect(selectModel({ nodeEnv: "production", env: {} })).toEqual({
      model: "gpt-4o",
      source: "default",
      lane: "prod",
    });
  });

  it("prefers OPENAI_MODEL_DEFAULT over the lane override", () => {
    const result = selectModel({
      appEnv: "staging",
      env: { OPENAI_MODEL_DEFAULT: "gpt-override", OPENAI_MODEL_STAGING: "gpt-staging" },
    });

    expect(result.model).toBe("gpt-override");
    expect(result.source).toBe("env");
  });

  it("reads the override for the active lane", () => {
    const result = selectModel({
      appEnv: "staging",
      env: { OPENAI_MODEL_STAGING: "gpt-staging", OPENAI_MODEL_PROD: "gpt-prod" },
    });

    expect(result).toEqual({ model: "gpt-staging", source: "env", lane: "staging" });
  });

  it("lets an explicit model win", () => {
    const result = selectModel({
      configuredModel: "gpt-pinned",
      env: { OPENAI_MODEL_DEFAULT: "gpt-override" },
    });

    expect(result).toEqual({ model: "gpt-pinned", source: "config", lane: "local" });
  });

  it("falls back to the local default for an unknown lane", () => {
    expect(selectModel({ appEnv: "qa", env: {} })).toEqual({
      model: "gpt-4o-mini",
      source: "default",
      lane: "qa",
    });
  });
});
