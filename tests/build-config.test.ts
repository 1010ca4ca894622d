import path from "path";
import { describe, expect, it } from "vitest";
import { normalizePublicUrl, resolveBuildConfig } from "../src/cli/utils/build-config";

const cwd = path.resolve("/work/app");

describe("resolveBuildConfig", () => {
  it("falls back to defaults", () => {
    const config = resolveBuildConfig(null, { cwd, env: {} });

    expect(config).toEqual({
      target: path.join(cwd, "index.html"),
      htmlDir: cwd,
      dist: path.join(cwd, "dist"),
      stagingDist: path.join(cwd, "dist", ".stage"),
      publicUrl: "/",
      release: false,
      filehash: true,
      failurePolicy: "fail-fast",
      tools: { cargo: "cargo", wasmBindgen: "wasm-bindgen" },
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tools)).toBe(true);
  });

  it("prefers CLI flags over env vars over the config file", () => {
    const config = resolveBuildConfig(
      { dist: "from-config", publicUrl: "cfg", release: true, filehash: false, failurePolicy: "aggregate" },
      {
        cwd,
        env: { KILN_DIST: "from-env", KILN_RELEASE: "0", KILN_FAILURE_POLICY: "fail-fast" },
        cli: { dist: "from-cli" },
      }
    );

    expect(config.dist).toBe(path.join(cwd, "from-cli"));
    expect(config.release).toBe(false);
    expect(config.publicUrl).toBe("/cfg/");
    expect(config.filehash).toBe(false);
    expect(config.failurePolicy).toBe("fail-fast");
  });

  it("reads the target and its directory from the environment", () => {
    const config = resolveBuildConfig(null, { cwd, env: { KILN_TARGET: "site/page.html", KILN_FILEHASH: "off" } });

    expect(config.target).toBe(path.join(cwd, "site", "page.html"));
    expect(config.htmlDir).toBe(path.join(cwd, "site"));
    expect(config.filehash).toBe(false);
  });

  it("skips values it cannot understand", () => {
    const config = resolveBuildConfig(
      { failurePolicy: "aggregate" },
      { cwd, env: { KILN_RELEASE: "maybe", KILN_FAILURE_POLICY: "sometimes" } }
    );

    expect(config.release).toBe(false);
    expect(config.failurePolicy).toBe("aggregate");
  });

  it("takes tool overrides from the config file", () => {
    const config = resolveBuildConfig({ tools: { cargo: "/opt/cargo" } }, { cwd, env: {} });

    expect(config.tools).toEqual({ cargo: "/opt/cargo", wasmBindgen: "wasm-bindgen" });
  });

  it("refuses a dist directory that contains the sources", () => {
    expect(() => resolveBuildConfig(null, { cwd, env: {}, cli: { dist: "." } })).toThrow(
      `dist directory ${JSON.stringify(cwd)} must not contain the source directory ${JSON.stringify(cwd)}`
    );
    expect(() => resolveBuildConfig(null, { cwd, env: {}, cli: { dist: ".." } })).toThrow(
      "must not contain the source directory"
    );
  });
});

describe("normalizePublicUrl", () => {
  it.each([
    ["", "/"],
    ["/", "/"],
    ["assets", "/assets/"],
    ["/assets", "/assets/"],
    ["/assets/", "/assets/"],
    ["https://cdn.test/app", "https://cdn.test/app/"],
    ["//cdn.test/app/", "//cdn.test/app/"],
  ])("normalizes %j to %j", (input, expected) => {
    expect(normalizePublicUrl(input)).toBe(expected);
  });
});
