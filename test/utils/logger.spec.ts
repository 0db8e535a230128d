import { describe, expect, it } from "vitest";

import { Logger, safeStringify, type LogSink } from "../../src/utils/logger";

function capture(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  const push = (m: string): void => {
    lines.push(m);
  };
  return { sink: { error: push, warn: push, info: push, debug: push }, lines };
}

describe("Logger", () => {
  it("drops messages above its level", () => {
    const { sink, lines } = capture();
    const log = new Logger({ name: "t", level: "warn", timestamp: false, sink });

    log.error("bad");
    log.warn("careful");
    log.info("fyi");
    log.debug("detail");

    expect(lines).toEqual(["[t] ERROR: bad", "[t] WARN: careful"]);
  });

  it("appends the payload as JSON, bigints included", () => {
    const { sink, lines } = capture();
    const log = new Logger({ name: "t", timestamp: false, sink });

    log.info("parsed", { functions: 2, big: 10n });
    expect(lines).toEqual(['[t] INFO: parsed {"functions":2,"big":"10"}']);
  });

  it("logs a keyed message only once", () => {
    const { sink, lines } = capture();
    const log = new Logger({ name: "t", timestamp: false, sink });

    log.logOnce("warn", "cfg", "config missing");
    log.logOnce("warn", "cfg", "config missing");
    expect(lines).toEqual(["[t] WARN: config missing"]);
  });

  it("changes level at runtime", () => {
    const { sink, lines } = capture();
    const log = new Logger({ name: "t", level: "silent", timestamp: false, sink });

    log.error("hidden");
    log.setLevel("info");
    log.info("shown");

    expect(log.getLevel()).toBe("info");
    expect(lines).toEqual(["[t] INFO: shown"]);
  });
});

describe("safeStringify", () => {
  it("reports values JSON cannot represent", () => {
    const loop: { self?: unknown } = {};
    loop.self = loop;
    expect(safeStringify(loop).startsWith("[unserializable: ")).toBe(true);
    expect(safeStringify(undefined)).toBe("undefined");
  });
});
