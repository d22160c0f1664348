import { describe, expect, it } from "vitest";
import { ConfigError } from "@stowage/shared";
import { readConfig, validateConfig } from "./config.js";

describe("validateConfig", () => {
  it("applies defaults and trims trailing slashes from the base URL", () => {
    const config = validateConfig({ identity: "testuser", baseUrl: "http://localhost:9710//" });

    expect(config).toEqual({
      identity: "testuser",
      baseUrl: "http://localhost:9710",
      logLevel: "info",
      prettyLogs: false
    });
  });

  it("keeps the identity verbatim", () => {
    expect(validateConfig({ identity: " spaced user ", baseUrl: "http://localhost" }).identity).toBe(
      " spaced user "
    );
  });

  it("lists every failing field", () => {
    try {
      validateConfig({ identity: "", baseUrl: "not a url" });
      throw new Error("expected validation to fail");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const configError = error as ConfigError;
      expect(configError.message).toBe("identity must not be empty; base URL must be an absolute URL");
      expect(configError.details).toEqual({
        issues: [
          { path: "identity", message: "identity must not be empty" },
          { path: "baseUrl", message: "base URL must be an absolute URL" }
        ]
      });
      expect(configError.remediation).toContain("STOWAGE_USER_ID");
    }
  });

  it("rejects a non-positive timeout", () => {
    expect(() => validateConfig({ identity: "testuser", baseUrl: "http://localhost", timeoutMs: 0 })).toThrow(
      ConfigError
    );
  });
});

describe("readConfig", () => {
  it("reads the client settings from the environment", () => {
    const config = readConfig({
      STOWAGE_USER_ID: "testuser",
      STOWAGE_API_URL: "http://localhost:9710",
      STOWAGE_TIMEOUT_MS: "2500",
      STOWAGE_LOG_LEVEL: "debug",
      NODE_ENV: "development"
    });

    expect(config).toEqual({
      identity: "testuser",
      baseUrl: "http://localhost:9710",
      timeoutMs: 2500,
      logLevel: "debug",
      prettyLogs: true
    });
  });

  it("fails when the identity is not set", () => {
    expect(() => readConfig({ STOWAGE_API_URL: "http://localhost:9710" })).toThrow(
      "identity must not be empty"
    );
  });

  it("rejects a non-numeric timeout", () => {
    expect(() =>
      readConfig({
        STOWAGE_USER_ID: "testuser",
        STOWAGE_API_URL: "http://localhost:9710",
        STOWAGE_TIMEOUT_MS: "soon"
      })
    ).toThrow("STOWAGE_TIMEOUT_MS must be a number");
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      readConfig({
        STOWAGE_USER_ID: "testuser",
        STOWAGE_API_URL: "http://localhost:9710",
        STOWAGE_LOG_LEVEL: "verbose"
      })
    ).toThrow("STOWAGE_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent");
  });
});
