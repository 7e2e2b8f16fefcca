import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "@/utils/logger";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("marathon").info("initialized", 2);

    expect(log).toHaveBeenCalledWith("[marathon]", "initialized", 2);
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("warn");

    const logger = createLogger("store");
    logger.debug("hidden");
    logger.warn("shown");

    expect(getLogLevel()).toBe("warn");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[store]", "shown");
  });
});
