import { describe, expect, it } from "vitest";
import { formatCommandLine, requireProvider } from "../../src/commands/common.js";
import { UsageError } from "../../src/util/errors.js";

describe("requireProvider", () => {
  it("accepts gh", () => {
    expect(requireProvider("gh")).toBe("gh");
  });

  it("rejects anything else as a usage error", () => {
    expect(() => requireProvider("glab")).toThrow(UsageError);
    expect(() => requireProvider("")).toThrow("invalid provider: ");
    expect(() => requireProvider("toString")).toThrow("invalid provider: toString");
  });
});

describe("formatCommandLine", () => {
  it("leaves shell-safe words bare", () => {
    expect(formatCommandLine("gh", ["alias", "delete", "dw_co"])).toBe(
      "gh alias delete dw_co",
    );
  });

  it("quotes words with spaces or quotes", () => {
    expect(formatCommandLine("gh", ["alias", "set", "dw_x", "pr list --author @me"])).toBe(
      "gh alias set dw_x 'pr list --author @me'",
    );
    expect(formatCommandLine("gh", ["it's"])).toBe("gh 'it'\\''s'");
  });
});
