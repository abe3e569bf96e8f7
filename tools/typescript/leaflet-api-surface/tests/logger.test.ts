/**
 * Tests for the console logger
 * ============================
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import { ConsoleLogger, createLogger, silentLogger } from "../src/logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix the level and append context as JSON", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    createLogger("info").info("Assembly built", { types: 3 });
    expect(info).toHaveBeenCalledWith('[INFO] Assembly built {"types":3}');
  });

  it("should mark circular references in the context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const context: Record<string, unknown> = { typeName: "Map" };
    context.self = context;
    createLogger("info").info("Constructed", context);
    expect(info).toHaveBeenCalledWith('[INFO] Constructed {"typeName":"Map","self":"[Circular]"}');
  });

  it("should fall back when the context cannot be serialised", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    createLogger("info").info("Constructed", { size: 1n });
    expect(info).toHaveBeenCalledWith("[INFO] Constructed [context serialization failed]");
  });

  it("should omit empty context", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    new ConsoleLogger("warnings").warn("Assembly validation skipped", {});
    expect(warn).toHaveBeenCalledWith("[WARN] Assembly validation skipped");
  });

  it("should drop messages below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = createLogger("errors");
    logger.info("hidden");
    logger.debug("hidden");
    logger.error("shown");

    expect(info).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[ERROR] shown");
  });

  it("should keep the silent logger quiet", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    silentLogger.error("nothing");
    expect(error).not.toHaveBeenCalled();
  });
});
