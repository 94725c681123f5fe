import { describe, it, expect } from "vitest";
import { MESSAGE_LEVEL_VALUE, PinoLogger, toPinoLevel } from "./PinoLogger.js";
import type { LogLevel } from "../../domain/ports/ILogger.js";

function capture(level: LogLevel): { logger: PinoLogger; entries: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const logger = new PinoLogger({
    level,
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
  });
  return {
    logger,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe("PinoLogger", () => {
  it("should map the level names onto pino levels", () => {
    expect(toPinoLevel("all")).toBe("trace");
    expect(toPinoLevel("none")).toBe("silent");
    expect(toPinoLevel("message")).toBe("message");
    expect(toPinoLevel("warn")).toBe("warn");
  });

  it("should write published values at the message level", () => {
    const { logger, entries } = capture("message");

    logger.debug("hidden");
    logger.message("Speed", { value: 12 });
    logger.info("shown");

    expect(entries().map((entry) => [entry.level, entry.msg])).toEqual([
      [MESSAGE_LEVEL_VALUE, "Speed"],
      [30, "shown"],
    ]);
    expect(entries()[0].value).toBe(12);
  });

  it("should drop message entries at info level", () => {
    const { logger, entries } = capture("info");

    logger.message("Speed", { value: 12 });

    expect(entries()).toEqual([]);
  });

  it("should write nothing at level none", () => {
    const { logger, entries } = capture("none");

    logger.fatal("gone");

    expect(logger.level).toBe("silent");
    expect(entries()).toEqual([]);
  });

  it("should serialize errors under err and other values under error", () => {
    const { logger, entries } = capture("info");

    logger.error("failed", new Error("boom"), { endpoint: "opc.tcp://localhost:4840" });
    logger.fatal("stopped", "BadTimeout");

    const [first, second] = entries();
    expect(first.endpoint).toBe("opc.tcp://localhost:4840");
    expect(first.err).toMatchObject({ type: "Error", message: "boom" });
    expect(second.error).toBe("BadTimeout");
    expect(second.level).toBe(60);
  });

  it("should carry child bindings", () => {
    const { logger, entries } = capture("info");

    logger.child({ component: "ConnectionController" }).warn("careful");

    expect(entries()[0]).toMatchObject({ component: "ConnectionController", msg: "careful", level: 40, name: "opcua-link" });
  });
});
