import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("censors the identity header", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", pretty: false }, { write: (line) => lines.push(line) });

    logger.debug({ headers: { User: "testuser", "content-type": "application/octet-stream" } }, "sending request");

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(entry.name).toBe("stowage-client");
    expect(entry.msg).toBe("sending request");
    expect(entry.headers).toEqual({ User: "[REDACTED]", "content-type": "application/octet-stream" });
  });

  it("drops entries below the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", pretty: false }, { write: (line) => lines.push(line) });

    logger.info("ignored");
    logger.warn("kept");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ msg: "kept" });
  });
});
