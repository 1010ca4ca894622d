import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AssetFile } from "../src/core/asset-file";
import { AssetEncodingError, AssetResolutionError } from "../src/core/errors";
import { contentHash } from "../src/core/utils/hash";
import { makeTempProject, removeTempProject, writeFiles } from "./helpers";

describe("AssetFile", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempProject();
  });

  afterEach(() => {
    removeTempProject(root);
  });

  it("resolves relative references against the base directory", async () => {
    writeFiles(root, { "styles/main.css": "body {}" });

    const file = await AssetFile.create(root, "styles/main.css");

    expect(file.path).toBe(path.join(root, "styles", "main.css"));
    expect(file.fileName).toBe("main.css");
    expect(file.fileStem).toBe("main");
    expect(file.ext).toBe("css");
  });

  it("canonicalizes symlinks to the file they point at", async () => {
    writeFiles(root, { "real/theme.css": "a {}" });
    fs.symlinkSync(path.join(root, "real", "theme.css"), path.join(root, "alias.css"));

    const file = await AssetFile.create(root, "alias.css");

    expect(file.path).toBe(path.join(root, "real", "theme.css"));
    expect(file.fileName).toBe("theme.css");
  });

  it("fails for a path that does not exist", async () => {
    const missing = AssetFile.create(root, "missing.css");

    await expect(missing).rejects.toBeInstanceOf(AssetResolutionError);
    await expect(missing).rejects.toThrow(
      `error getting canonical path for ${JSON.stringify(path.join(root, "missing.css"))}`
    );
  });

  it("fails for a path without a file name", async () => {
    await expect(AssetFile.create(root, "/")).rejects.toThrow('asset has no file name "/"');
  });

  it("requires an extension only when asked to", async () => {
    writeFiles(root, { LICENSE: "MIT" });

    const plain = await AssetFile.create(root, "LICENSE");
    expect(plain.ext).toBeNull();
    expect(plain.fileStem).toBe("LICENSE");

    await expect(AssetFile.create(root, "LICENSE", { requireExtension: true })).rejects.toThrow(
      `asset has no file extension ${JSON.stringify(path.join(root, "LICENSE"))}`
    );
  });

  it("fails for a directory", async () => {
    fs.mkdirSync(path.join(root, "assets"));

    await expect(AssetFile.create(root, "assets")).rejects.toThrow(
      `target is not a file ${JSON.stringify(path.join(root, "assets"))}`
    );
  });

  describe("copy", () => {
    let out: string;

    beforeEach(() => {
      out = path.join(root, "out");
      fs.mkdirSync(out);
    });

    it("names hashed copies after their content alone", async () => {
      writeFiles(root, {
        "a/app.css": "body { color: red; }",
        "b/app.css": "body { color: red; }",
      });
      const digest = await contentHash("body { color: red; }");

      const first = await (await AssetFile.create(root, "a/app.css")).copy(out, true);
      const second = await (await AssetFile.create(root, "b/app.css")).copy(out, true);

      expect(first).toBe(`app-${digest}.css`);
      expect(second).toBe(first);
      expect(fs.readFileSync(path.join(out, first), "utf8")).toBe("body { color: red; }");
    });

    it("gives different content a different name", async () => {
      writeFiles(root, {
        "a/app.css": "body { color: red; }",
        "b/app.css": "body { color: blue; }",
      });

      const first = await (await AssetFile.create(root, "a/app.css")).copy(out, true);
      const second = await (await AssetFile.create(root, "b/app.css")).copy(out, true);

      expect(second).not.toBe(first);
      expect(fs.readdirSync(out).sort()).toEqual([first, second].sort());
    });

    it("keeps a trailing dot for extensionless hashed names", async () => {
      writeFiles(root, { LICENSE: "MIT" });
      const digest = await contentHash("MIT");

      const name = await (await AssetFile.create(root, "LICENSE")).copy(out, true);

      expect(name).toBe(`LICENSE-${digest}.`);
    });

    it("keeps the original name without hashing and overwrites an existing file", async () => {
      writeFiles(root, { "app.js": "console.log(2);", "out/app.js": "console.log(1);" });

      const name = await (await AssetFile.create(root, "app.js")).copy(out, false);

      expect(name).toBe("app.js");
      expect(fs.readFileSync(path.join(out, "app.js"), "utf8")).toBe("console.log(2);");
    });
  });

  describe("readText", () => {
    it("decodes UTF-8", async () => {
      writeFiles(root, { "note.html": "<p>héllo</p>" });

      const file = await AssetFile.create(root, "note.html");

      await expect(file.readText()).resolves.toBe("<p>héllo</p>");
    });

    it("rejects bytes that are not UTF-8", async () => {
      writeFiles(root, { "broken.svg": Uint8Array.from([0x3c, 0xff, 0xfe, 0x3e]) });
      const file = await AssetFile.create(root, "broken.svg");

      const text = file.readText();

      await expect(text).rejects.toBeInstanceOf(AssetEncodingError);
      await expect(text).rejects.toThrow(
        `file is not valid UTF-8 ${JSON.stringify(path.join(root, "broken.svg"))}`
      );
    });
  });
});
