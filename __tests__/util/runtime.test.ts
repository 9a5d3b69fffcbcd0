import { describe, expect, it } from "vitest";
import { EnvironmentError } from "../../src/util/errors.js";
import { MIN_NODE_MAJOR, requireNodeVersion } from "../../src/util/runtime.js";

describe("requireNodeVersion", () => {
  it("accepts the minimum major and newer", () => {
    expect(MIN_NODE_MAJOR).toBe(20);
    expect(() => requireNodeVersion("20.0.0")).not.toThrow();
    expect(() => requireNodeVersion("22.3.1")).not.toThrow();
  });

  it("rejects older runtimes", () => {
    expect(() => requireNodeVersion("18.19.0")).toThrow(EnvironmentError);
    expect(() => requireNodeVersion("18.19.0")).toThrow("requires Node.js 20+");
  });

  it("rejects an unparsable version", () => {
    expect(() => requireNodeVersion("unknown")).toThrow("requires Node.js 20+");
  });

  it("checks the running process by default", () => {
    expect(() => requireNodeVersion()).not.toThrow();
  });
});
