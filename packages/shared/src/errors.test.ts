import { describe, expect, it } from "vitest";
import { ConfigError, FileReadError, ParseError, ResponseError, StowageError } from "./errors.js";

describe("errors", () => {
  it("renders an envelope with remediation and details", () => {
    const error = new ConfigError("identity must not be empty", {
      remediation: "Set STOWAGE_USER_ID",
      details: { issues: ["identity"] }
    });

    expect(error).toBeInstanceOf(StowageError);
    expect(error.name).toBe("ConfigError");
    expect(error.toEnvelope()).toEqual({
      code: "config_invalid",
      message: "identity must not be empty",
      remediation: "Set STOWAGE_USER_ID",
      details: { issues: ["identity"] }
    });
  });

  it("names a missing file and keeps the cause", () => {
    const cause = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
    const error = new FileReadError("/tmp/missing.txt", cause);

    expect(error.message).toBe("file not found: /tmp/missing.txt");
    expect(error.path).toBe("/tmp/missing.txt");
    expect(error.cause).toBe(cause);
  });

  it("reports other read failures generically", () => {
    const cause = Object.assign(new Error("EACCES"), { code: "EACCES" });
    expect(new FileReadError("/root/secret", cause).message).toBe("failed to read file: /root/secret");
  });

  it("carries the parse failure reason in details", () => {
    const error = new ParseError("layout", "bad vtable", { offset: 6 });
    expect(error.toEnvelope().details).toEqual({ reason: "layout", offset: 6 });
  });

  it("formats response failures with status and body", () => {
    const error = new ResponseError(404, "key not found");
    expect(error.message).toBe("Request failed (404): key not found");
    expect(error.status).toBe(404);
  });
});
