import { describe, it, expect } from "vitest";
import { createSourceChecker, resolveCheckerOptions, DEFAULT_OPTIONS } from "../src/index.js";

describe("package entry", () => {
  it("exposes a working source checker", () => {
    const checker = createSourceChecker("Buttons", resolveCheckerOptions({}));

    expect(
      checker.checkImport("MDCInkView.h", { checkedFile: "src/MDCButton.m", moduleFiles: [] })
    ).toBe("src/MDCButton.m imports a non-umbrella header: MDCInkView.h");
  });

  it("exposes the default options", () => {
    expect(DEFAULT_OPTIONS.umbrellaPrefix).toBe("Material");
    expect(DEFAULT_OPTIONS.frameworkName).toBe("MaterialComponents");
  });
});
