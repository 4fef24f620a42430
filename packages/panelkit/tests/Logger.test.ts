import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Logger, LogLevel, SystemLogger } from "../src/utils/Logger";

describe("Logger", () => {
  beforeEach(() => {
    Logger.clearLogs();
    Logger.configure({ minLevel: LogLevel.DEBUG, enableConsole: false });
  });

  afterEach(() => {
    Logger.clearLogs();
    Logger.configure({ minLevel: LogLevel.ERROR });
  });

  it("should drop entries below the minimum level", () => {
    Logger.setLogLevel(LogLevel.WARN);
    Logger.info("ignored");
    Logger.warn("kept");
    expect(Logger.getRecentLogs().map((entry) => entry.message)).toEqual(["kept"]);
    expect(Logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
  });

  it("should prefix component messages and count them", () => {
    const log = new SystemLogger("PanelStack");
    log.info("Reset", { removed: 2 });
    log.warn("Ignoring push");

    const entries = Logger.getSystemLogs("PanelStack");
    expect(entries.map((entry) => entry.message)).toEqual([
      "[PanelStack] Reset",
      "[PanelStack] Ignoring push",
    ]);
    expect(entries[0].context).toEqual({ removed: 2 });
    expect(Logger.getSystemStats().get("PanelStack")).toEqual({
      errors: 0,
      warnings: 1,
      messages: 1,
    });
  });

  it("should attribute debug entries to their component", () => {
    new SystemLogger("PanelStack").debug("Pushed panel", { depth: 1 });

    const [entry] = Logger.getSystemLogs("PanelStack");
    expect(entry.level).toBe(LogLevel.DEBUG);
    expect(entry.message).toBe("[PanelStack] Pushed panel");
    expect(entry.system).toBe("PanelStack");
    expect(Logger.getSystemStats().has("PanelStack")).toBe(false);
  });

  it("should keep errors with their cause", () => {
    const cause = new Error("boom");
    new SystemLogger("Draw").error("Panel failed", cause);
    const [entry] = Logger.getRecentLogs(1);
    expect(entry.level).toBe(LogLevel.ERROR);
    expect(entry.error).toBe(cause);
  });

  it("should bound the in-memory buffer", () => {
    Logger.configure({ maxLogEntries: 3 });
    for (let i = 0; i < 5; i++) Logger.info(`entry ${i}`);
    expect(Logger.getRecentLogs().map((entry) => entry.message)).toEqual([
      "entry 2",
      "entry 3",
      "entry 4",
    ]);
    Logger.configure({ maxLogEntries: 10000 });
  });
});
