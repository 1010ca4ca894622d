import { describe, expect, it } from "vitest";
import { hashedFileName, publicHref } from "../src/core/utils/cas";
import { contentHash } from "../src/core/utils/hash";

describe("contentHash", () => {
  it("is a pure function of the bytes", async () => {
    const fromString = await contentHash("kiln");
    const fromBytes = await contentHash(Buffer.from("kiln", "utf8"));

    expect(fromBytes).toBe(fromString);
    expect(fromString).toMatch(/^[0-9a-f]{1,16}$/);
  });

  it("distinguishes different content", async () => {
    expect(await contentHash("body { color: red; }")).not.toBe(await contentHash("body { color: blue; }"));
  });
});

describe("hashedFileName", () => {
  it("puts the digest between stem and extension", () => {
    expect(hashedFileName("app", "1f2e", "css")).toBe("app-1f2e.css");
    expect(hashedFileName("app.min", "1f2e", "js")).toBe("app.min-1f2e.js");
  });

  it("keeps the dot when there is no extension", () => {
    expect(hashedFileName("LICENSE", "1f2e", null)).toBe("LICENSE-1f2e.");
  });
});

describe("publicHref", () => {
  it("joins segments onto the public URL", () => {
    expect(publicHref("/", "app.css")).toBe("/app.css");
    expect(publicHref("/assets/", "img/", "/logo.png")).toBe("/assets/img/logo.png");
    expect(publicHref("https://cdn.test/app/", "main.js")).toBe("https://cdn.test/app/main.js");
  });
});
