import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "../log.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes info lines with its scope", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("server").info("listening on :3000");
    expect(log).toHaveBeenCalledWith("[server] listening on :3000");
  });

  it("passes the error through to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const cause = new Error("disk full");
    const logger = createLogger("http");
    logger.error("request failed", cause);
    logger.error("shutting down");
    expect(error.mock.calls).toEqual([["[http] request failed", cause], ["[http] shutting down"]]);
  });
});
