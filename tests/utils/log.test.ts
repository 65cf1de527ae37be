import { afterEach, describe, it, expect, vi } from "vitest";
import { logger } from "../../src/utils/log.js";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("logger", () => {
  it("writes levelled lines to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.warn("careful");
    expect(stderr).toHaveBeenCalledWith("[warn] careful");
  });

  it("drops debug lines unless enabled", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubEnv("KEYBOARD_TUNING_DEBUG", "");
    logger.debug("hidden");
    expect(stderr).not.toHaveBeenCalled();

    vi.stubEnv("KEYBOARD_TUNING_DEBUG", "1");
    logger.debug("shown");
    expect(stderr).toHaveBeenCalledWith("[debug] shown");
  });
});
