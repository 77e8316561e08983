/**
 * Tests for Snippet Lens configuration loading.
 */

import * as path from "path";
import { loadConfig, loadConfigFromString, createDefaultConfig, parseConfig } from "../src/config/loader";

const FIXTURES_DIR = path.join(__dirname, "fixtures");

describe("Config Loading", () => {
  describe("createDefaultConfig", () => {
    it("should return the default settings", () => {
      const config = createDefaultConfig();

      expect(config.llm).toEqual({
        default_model: "codellama",
        temperature: 0.1,
        max_tokens: 2048,
        timeout_ms: 60_000,
        models_timeout_ms: 5000,
      });
      expect(config.retry).toEqual({ max_attempts: 3, delay_ms: 2000 });
      expect(config.rateLimit).toEqual({ max_calls: 3, period_ms: 5000, max_wait_ms: 30_000 });
      expect(config.history.max_entries).toBe(100);
      expect(config.server.requests_per_minute).toBe(60);
    });

    it("should take the default model from DEFAULT_MODEL when the file names none", async () => {
      process.env.DEFAULT_MODEL = "mistral";
      jest.resetModules();
      try {
        const loader = await import("../src/config/loader");

        expect(loader.createDefaultConfig().llm.default_model).toBe("mistral");
        expect(loader.loadConfigFromString("llm:\n  default_model: llama3").llm.default_model).toBe("llama3");
      } finally {
        delete process.env.DEFAULT_MODEL;
        jest.resetModules();
      }
    });
  });

  describe("loadConfig", () => {
    it("should load .snippetlens.yml and merge it with defaults", () => {
      const config = loadConfig(path.join(FIXTURES_DIR, "snippetlens-config"));

      expect(config.raw.version).toBe(1);
      expect(config.llm.default_model).toBe("llama3");
      expect(config.llm.temperature).toBe(0.2);
      expect(config.llm.max_tokens).toBe(2048);
      expect(config.retry).toEqual({ max_attempts: 5, delay_ms: 2000 });
      expect(config.rateLimit).toEqual({ max_calls: 10, period_ms: 60_000, max_wait_ms: 30_000 });
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path");

      expect(config.raw).toEqual({});
      expect(config.retry.max_attempts).toBe(3);
    });

    it("should fall back to defaults when the file is malformed", () => {
      const config = loadConfig(path.join(FIXTURES_DIR, "broken-config"));

      expect(config.llm.default_model).toBe("codellama");
      expect(config.rateLimit.max_calls).toBe(3);
    });
  });

  describe("loadConfigFromString", () => {
    it("should parse every section", () => {
      const config = loadConfigFromString(`
llm:
  timeout_ms: 5000
rate_limit:
  max_wait_ms: 0
history:
  max_entries: 10
server:
  requests_per_minute: 5
`);

      expect(config.llm.timeout_ms).toBe(5000);
      expect(config.rateLimit.max_wait_ms).toBe(0);
      expect(config.history.max_entries).toBe(10);
      expect(config.server.requests_per_minute).toBe(5);
    });

    it("should accept temperatures up to 2 and a model listing timeout", () => {
      const config = loadConfigFromString(`
llm:
  temperature: 1.5
  models_timeout_ms: 2000
`);

      expect(config.llm.temperature).toBe(1.5);
      expect(config.llm.models_timeout_ms).toBe(2000);
    });

    it("should ignore invalid values and keep the defaults", () => {
      const config = loadConfigFromString(`
llm:
  temperature: 7
  max_tokens: "lots"
  default_model: ""
retry:
  max_attempts: 0
  delay_ms: -5
rate_limit:
  max_calls: 2.5
`);

      expect(config.llm.temperature).toBe(0.1);
      expect(config.llm.max_tokens).toBe(2048);
      expect(config.llm.default_model).toBe("codellama");
      expect(config.retry).toEqual({ max_attempts: 3, delay_ms: 2000 });
      expect(config.rateLimit.max_calls).toBe(3);
    });

    it("should throw on malformed YAML", () => {
      expect(() => loadConfigFromString("llm: [unclosed")).toThrow();
    });
  });

  describe("parseConfig", () => {
    it("should treat non-object documents as empty", () => {
      expect(parseConfig(null)).toEqual({});
      expect(parseConfig("just a string")).toEqual({});
      expect(parseConfig([1, 2])).toEqual({});
    });

    it("should ignore sections that are not mappings", () => {
      const parsed = parseConfig({ llm: "codellama", retry: { max_attempts: 2 } });

      expect(parsed.llm?.default_model).toBeUndefined();
      expect(parsed.retry?.max_attempts).toBe(2);
    });
  });
});
