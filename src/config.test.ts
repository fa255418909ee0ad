import { describe, expect, it } from "vitest";
import { DEFAULT_SYSTEM_PROMPT, assertUpstreamCredentials, describeUpstream, loadAppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadAppConfig", () => {
  it("falls back to defaults with an empty environment", () => {
    const config = loadAppConfig({});

    expect(config).toMatchObject({
      provider: "scripted",
      reasoningEffort: "medium",
      reasoningSummary: "detailed",
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      complianceLogDir: "compliance_logs",
      complianceLoggingEnabled: true,
      host: "0.0.0.0",
      port: 8000,
      debug: false,
    });
    expect(config.azure).toEqual({ apiKey: "", endpoint: "", deployment: "gpt-5-nano", apiVersion: "2025-03-01-preview" });
    expect(config.openai).toEqual({ apiKey: "", baseUrl: null, model: "gpt-5-nano" });
  });

  it("infers the provider from the credentials present", () => {
    expect(loadAppConfig({ OPENAI_API_KEY: "test-key" }).provider).toBe("openai");
    expect(
      loadAppConfig({ OPENAI_API_KEY: "test-key", AZURE_OPENAI_ENDPOINT: "https://example.test" }).provider,
    ).toBe("azure");
    expect(loadAppConfig({ THINKSTREAM_PROVIDER: " Scripted ", OPENAI_API_KEY: "test-key" }).provider).toBe("scripted");
  });

  it("reads overrides and trims values", () => {
    const config = loadAppConfig({
      PORT: " 9000 ",
      HOST: "127.0.0.1",
      REASONING_EFFORT: "HIGH",
      ENABLE_COMPLIANCE_LOGGING: "False",
      COMPLIANCE_LOG_DIR: "/var/log/audit",
      THINKSTREAM_DEBUG: "yes",
    });

    expect(config).toMatchObject({
      port: 9000,
      host: "127.0.0.1",
      reasoningEffort: "high",
      complianceLoggingEnabled: false,
      complianceLogDir: "/var/log/audit",
      debug: true,
    });
  });

  it("rejects invalid choices and ports", () => {
    expect(() => loadAppConfig({ THINKSTREAM_PROVIDER: "vertex" })).toThrow(
      'THINKSTREAM_PROVIDER must be one of azure, openai, scripted (got "vertex")',
    );
    expect(() => loadAppConfig({ REASONING_SUMMARY: "long" })).toThrow(ConfigError);
    expect(() => loadAppConfig({ PORT: "80.5" })).toThrow('PORT must be a port number (got "80.5")');
    expect(() => loadAppConfig({ PORT: "70000" })).toThrow(ConfigError);
  });
});

describe("assertUpstreamCredentials", () => {
  it("names every missing Azure variable", () => {
    expect(() => assertUpstreamCredentials(loadAppConfig({ THINKSTREAM_PROVIDER: "azure" }))).toThrow(
      "Missing required environment variables: AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT",
    );
  });

  it("accepts complete credentials and the scripted provider", () => {
    expect(() =>
      assertUpstreamCredentials(
        loadAppConfig({ AZURE_OPENAI_API_KEY: "test-key", AZURE_OPENAI_ENDPOINT: "https://example.test" }),
      ),
    ).not.toThrow();
    expect(() => assertUpstreamCredentials(loadAppConfig({}))).not.toThrow();
    expect(() => assertUpstreamCredentials(loadAppConfig({ THINKSTREAM_PROVIDER: "openai" }))).toThrow(
      "Missing required environment variables: OPENAI_API_KEY",
    );
  });
});

describe("describeUpstream", () => {
  it("reports the Azure deployment and API version", () => {
    const config = loadAppConfig({
      AZURE_OPENAI_ENDPOINT: "https://example.test",
      AZURE_OPENAI_MODEL_DEPLOYMENT: "my-deployment",
    });

    expect(describeUpstream(config)).toEqual({
      provider: "azure",
      model: "my-deployment",
      apiVersion: "2025-03-01-preview",
      endpoint: "https://example.test",
    });
  });
});
