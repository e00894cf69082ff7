import { describe, it, expect, afterEach, vi } from "vitest";
import { config, debug, setDebugWriter } from "../src/index.js";

describe("debug", () => {
  afterEach(() => {
    setDebugWriter();
    config.reset();
  });

  it("writes nothing while debug is off", () => {
    const lines: string[] = [];
    setDebugWriter((line) => lines.push(line));
    debug("matrix", "reshaped");
    expect(lines).toEqual([]);
  });

  it("prefixes the scope when debug is on", () => {
    const lines: string[] = [];
    setDebugWriter((line) => lines.push(line));
    config.set({ debug: true });
    debug("matrix", "reshaped 2x2 to 1x4");
    expect(lines).toEqual(["[texforge:matrix] reshaped 2x2 to 1x4"]);
  });

  it("only evaluates lazy messages when enabled", () => {
    const message = vi.fn(() => "built");
    setDebugWriter(() => undefined);
    debug("env", message);
    expect(message).not.toHaveBeenCalled();

    config.set({ debug: true });
    debug("env", message);
    expect(message).toHaveBeenCalledTimes(1);
  });

  it("lets the caller decide with an explicit flag", () => {
    const lines: string[] = [];
    setDebugWriter((line) => lines.push(line));
    debug("env", "forced", true);
    config.set({ debug: true });
    debug("env", "suppressed", false);
    expect(lines).toEqual(["[texforge:env] forced"]);
  });

  it("defaults to console.log", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    config.set({ debug: true });
    debug("env", "hello");
    expect(spy).toHaveBeenCalledWith("[texforge:env] hello");
    spy.mockRestore();
  });
});
