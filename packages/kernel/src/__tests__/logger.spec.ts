/**
 * Logger Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { Logger } from "../logger.js";

function createSink(): { lines: string[]; write(msg: string): void } {
  const lines: string[] = [];
  return {
    lines,
    write(msg: string) {
      lines.push(msg);
    },
  };
}

describe("Logger", () => {
  afterEach(() => {
    Logger.configure({ level: "silent" });
  });

  it("returns the same logger for the same component", () => {
    expect(Logger.for("Registry")).toBe(Logger.for("Registry"));
    expect(Logger.for("Registry")).not.toBe(Logger.for("Negotiator"));
  });

  it("writes JSON records bound to the component", () => {
    const sink = createSink();
    Logger.configure({ level: "debug", destination: sink });

    Logger.for("Registry").info({ sid: "abc" }, "session registered");

    expect(sink.lines).toHaveLength(1);
    const record = JSON.parse(sink.lines[0]);
    expect(record.level).toBe(30);
    expect(record.component).toBe("Registry");
    expect(record.sid).toBe("abc");
    expect(record.msg).toBe("session registered");
  });

  it("accepts a bare message", () => {
    const sink = createSink();
    Logger.configure({ level: "debug", destination: sink });

    Logger.for("Server").warn("closing all sessions");

    const record = JSON.parse(sink.lines[0]);
    expect(record.level).toBe(40);
    expect(record.msg).toBe("closing all sessions");
  });

  it("drops records below the configured level", () => {
    const sink = createSink();
    Logger.configure({ level: "warn", destination: sink });
    const log = Logger.for("Dispatcher");

    log.debug({ sid: "abc" }, "ignored");
    log.info("ignored too");
    log.error({ sid: "abc" }, "kept");

    expect(sink.lines).toHaveLength(1);
    expect(JSON.parse(sink.lines[0]).msg).toBe("kept");
    expect(log.isLevelEnabled("info")).toBe(false);
    expect(log.isLevelEnabled("error")).toBe(true);
  });

  it("moves existing component loggers to a reconfigured root", () => {
    const log = Logger.for("Upgrade");
    const first = createSink();
    const second = createSink();

    Logger.configure({ level: "info", destination: first });
    log.info("one");
    Logger.configure({ level: "info", destination: second });
    log.info("two");

    expect(first.lines.map((line) => JSON.parse(line).msg)).toEqual(["one"]);
    expect(second.lines.map((line) => JSON.parse(line).msg)).toEqual(["two"]);
  });
});
