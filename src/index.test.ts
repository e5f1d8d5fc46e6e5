import { describe, it, expect } from "vitest";
import { APP_NAME, APP_VERSION, partition, retokenizeLine } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Perplexity Sectioner");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });

  it("should re-export the public API", () => {
    expect(typeof partition).toBe("function");
    expect(retokenizeLine("cat dog (utt01)")).toBe("c a t _ d o g (utt01)");
  });
});
