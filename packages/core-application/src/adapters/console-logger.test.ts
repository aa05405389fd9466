import { describe, it, expect, vi, afterEach } from "vitest";

import { ConsoleLogger } from "./console-logger";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops debug output unless verbose", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    new ConsoleLogger().debug("hidden");
    new ConsoleLogger(true).debug("shown");

    expect(debug.mock.calls).toEqual([["shown"]]);
  });

  it("sends warnings and errors to stderr", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = new ConsoleLogger();
    logger.warn("careful");
    logger.error("broken");

    expect(warn.mock.calls).toEqual([["careful"]]);
    expect(error.mock.calls).toEqual([["broken"]]);
  });
});
