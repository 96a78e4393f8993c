import { describe, it, expect } from "vitest";

import { ApiChatModel, isApiProvider, splitSystemMessages } from "../api-chat-model.js";
import { ConfigurationError } from "../../errors.js";

describe("ApiChatModel", () => {
  it("should require an API key", () => {
    expect(() => new ApiChatModel({ provider: "openai" }, {})).toThrow(ConfigurationError);
  });

  it("should read the key from the environment and default the model", () => {
    const model = new ApiChatModel({ provider: "anthropic" }, { ANTHROPIC_API_KEY: "test-secret" });
    expect(model.modelId).toBe("claude-sonnet-4-20250514");
  });

  it("should keep an explicit model id", () => {
    const model = new ApiChatModel({ provider: "openai", apiKey: "test-secret", modelId: "gpt-4o-mini" }, {});
    expect(model.modelId).toBe("gpt-4o-mini");
  });
});

describe("splitSystemMessages", () => {
  it("should join system messages and keep turns in order", () => {
    expect(
      splitSystemMessages([
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        { role: "system", content: "Use doc blocks." },
        { role: "assistant", content: "Hello" },
      ])
    ).toEqual({
      system: "Be brief.\n\nUse doc blocks.",
      turns: [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello" },
      ],
    });
  });
});

describe("isApiProvider", () => {
  it("should accept known providers only", () => {
    expect(isApiProvider("openai")).toBe(true);
    expect(isApiProvider("google")).toBe(false);
  });
});
