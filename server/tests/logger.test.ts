import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../src/logger";

describe("Logger", () => {
  const saved = { NODE_ENV: process.env.NODE_ENV, LOG_LEVEL: process.env.LOG_LEVEL };

  const restore = (name: keyof typeof saved) => {
    const value = saved[name];
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  };

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    restore("NODE_ENV");
    restore("LOG_LEVEL");
    vi.restoreAllMocks();
  });

  it("stays quiet under test", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    new Logger().warn("quiet");
    expect(warn).not.toHaveBeenCalled();
  });

  it("reads the environment when it logs rather than when it is built", () => {
    const logger = new Logger();
    process.env.NODE_ENV = "development";
    process.env.LOG_LEVEL = "error";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.warn("skipped");
    logger.error("printed");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[ERROR] printed", "", "");
  });

  it("prefers a level set in code over LOG_LEVEL", () => {
    const logger = new Logger();
    process.env.NODE_ENV = "development";
    process.env.LOG_LEVEL = "error";
    logger.setLevel("debug");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    logger.debug("shown");

    expect(debug).toHaveBeenCalledWith("[DEBUG] shown", "");
  });

  it("defaults to info", () => {
    process.env.NODE_ENV = "development";
    const logger = new Logger();
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logger.debug("hidden");
    logger.info("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("[INFO] shown", "");
  });
});
