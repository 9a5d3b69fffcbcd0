import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { error, isVerbose, log, out, setVerbose } from "../../src/util/logger.js";

describe("logger", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setVerbose(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("out()", () => {
    it("writes a tagged line to stdout", () => {
      out("installed 2 aliases");
      expect(logSpy).toHaveBeenCalledWith("dotwrap: installed 2 aliases");
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe("log()", () => {
    it("is silent by default", () => {
      log("test message");
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("writes a tagged line to stderr when verbose", () => {
      setVerbose(true);
      log("hello");
      expect(isVerbose()).toBe(true);
      expect(errorSpy).toHaveBeenCalledWith("dotwrap: hello");
    });

    it("is silent again after setVerbose(false)", () => {
      setVerbose(true);
      setVerbose(false);
      log("should not appear");
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe("error()", () => {
    it("always outputs to stderr with the tool tag", () => {
      error("something broke");
      expect(errorSpy).toHaveBeenCalledWith("dotwrap: something broke");
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
