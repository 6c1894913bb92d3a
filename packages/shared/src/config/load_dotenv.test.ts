import { describe, expect, it } from "vitest";
import { parseDotEnv, parseEnvValue } from "./load_dotenv";

describe("parseEnvValue", () => {
  it("strips a trailing inline comment from unquoted values", () => {
    expect(parseEnvValue("llama3.2 # local model")).toBe("llama3.2");
  });

  it("keeps # when it is part of the value", () => {
    expect(parseEnvValue("abc#123")).toBe("abc#123");
  });

  it("returns the inside of quoted values", () => {
    expect(parseEnvValue('"Api-Token test-secret" # token')).toBe("Api-Token test-secret");
    expect(parseEnvValue("'a # b'")).toBe("a # b");
  });
});

describe("parseDotEnv", () => {
  it("skips comments and malformed lines", () => {
    const parsed = parseDotEnv(
      ["# comment", "", "API_PORT=8080", "export DEFAULT_LLM_PROVIDER=ollama", "NOT_A_PAIR", "=orphan"].join("\n"),
    );

    expect(parsed).toEqual({ API_PORT: "8080", DEFAULT_LLM_PROVIDER: "ollama" });
  });
});
