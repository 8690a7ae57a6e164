import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";

import { createConfig, searchPathFor } from "../src/config.js";
import { loadDockspecConfig, mergeConfigs, parseSimpleYaml } from "../src/config-file.js";
import { ConfigError, ValidationError } from "../src/errors.js";
import { disableQuietMode, enableQuietMode } from "../src/logger.js";
import { makeTempDir, removeTempDirs } from "./mocks/spec-fixtures.js";

beforeAll(() => {
  enableQuietMode();
});

afterAll(() => {
  disableQuietMode();
});

afterEach(() => {
  removeTempDirs();
});

describe("parseSimpleYaml", () => {
  it("reads top-level keys and the vars block", () => {
    const parsed = parseSimpleYaml(
      [
        "# project settings",
        "specPath: ./specs:/opt/shared",
        'output: "./build"',
        "vars:",
        '  PYTHON_VERSION: "3.11"',
        "  CONDA_DIR: /opt/conda",
        "wipeMethod: shred",
        "",
      ].join("\n")
    );

    expect(parsed).toEqual({
      specPath: "./specs:/opt/shared",
      output: "./build",
      wipeMethod: "shred",
      vars: { PYTHON_VERSION: "3.11", CONDA_DIR: "/opt/conda" },
    });
  });

  it("turns true and false into booleans", () => {
    expect(parseSimpleYaml("a: true\nb: false\n")).toEqual({ a: true, b: false });
  });
});

describe("mergeConfigs", () => {
  it("lets later configs win and merges vars", () => {
    expect(
      mergeConfigs(
        { output: "global", vars: { A: "1", B: "2" } },
        null,
        { wipeMethod: "shred", vars: { B: "3" } }
      )
    ).toEqual({ output: "global", wipeMethod: "shred", vars: { A: "1", B: "3" } });
  });
});

describe("loadDockspecConfig", () => {
  it("layers the project file over the global file", () => {
    const home = makeTempDir();
    const globalPath = join(home, "config.yaml");
    writeFileSync(globalPath, "output: g\nvars:\n  A: 1\n  B: 2\n");
    const projectDir = makeTempDir();
    writeFileSync(join(projectDir, "dockspec.yaml"), "wipeMethod: shred\nvars:\n  B: 3\n");

    expect(loadDockspecConfig(projectDir, globalPath)).toEqual({
      output: "g",
      wipeMethod: "shred",
      vars: { A: "1", B: "3" },
    });
  });

  it("returns an empty config when no file exists", () => {
    const dir = makeTempDir();
    expect(loadDockspecConfig(dir, join(dir, "absent.yaml"))).toEqual({});
  });

  it("rejects an unknown wipe method", () => {
    const dir = makeTempDir();
    writeFileSync(join(dir, ".dockspecrc"), "wipeMethod: burn\n");

    expect(() => loadDockspecConfig(dir, join(dir, "absent.yaml"))).toThrow(ConfigError);
  });

  it("rejects credential keys under vars", () => {
    const dir = makeTempDir();
    writeFileSync(join(dir, "dockspec.yml"), "vars:\n  CREDENTIAL_TOKEN: test-secret\n");

    expect(() => loadDockspecConfig(dir, join(dir, "absent.yaml"))).toThrow(
      `${join(dir, "dockspec.yml")}: 'CREDENTIAL_TOKEN' cannot be set under vars`
    );
  });
});

describe("createConfig", () => {
  const base = { cwd: "/work", bundledDir: "/pkg/specs" };

  it("ranks --set over file vars over environment variables", () => {
    const config = createConfig({
      ...base,
      env: { DOCKSPEC_VAR_TAG: "env", DOCKSPEC_VAR_OTHER: "o", DOCKSPEC_PATH: "/a:/b" },
      fileConfig: { vars: { TAG: "file" }, specPath: "/f" },
      assignments: ["TAG=cli"],
      specDirs: ["/s"],
    });

    expect([...config.variables]).toEqual([
      ["TAG", "cli"],
      ["OTHER", "o"],
    ]);
    expect(config.specDirs).toEqual(["/s", "/f"]);
    expect(searchPathFor(config)).toEqual(["/s", "/f", "/a", "/b", "/work", "/pkg/specs"]);
    expect(config.outputDir).toBe("/work");
    expect(config.wipeMethod).toBe("overwrite");
  });

  it("ignores environment entries that would set a credential", () => {
    const config = createConfig({ ...base, env: { DOCKSPEC_VAR_CREDENTIAL_TOKEN: "test-secret" } });
    expect(config.variables.size).toBe(0);
  });

  it("refuses credential assignments on the command line", () => {
    expect(() => createConfig({ ...base, env: {}, assignments: ["CREDENTIAL_TOKEN=test-secret"] })).toThrow(
      ValidationError
    );
  });

  it("resolves the output directory against cwd", () => {
    expect(createConfig({ ...base, env: {}, fileConfig: { output: "build" } }).outputDir).toBe("/work/build");
    expect(createConfig({ ...base, env: {}, outputDir: "/tmp/out", fileConfig: { output: "build" } }).outputDir).toBe(
      "/tmp/out"
    );
  });

  it("takes the wipe method from flags before the file", () => {
    expect(createConfig({ ...base, env: {}, fileConfig: { wipeMethod: "shred" } }).wipeMethod).toBe("shred");
    expect(
      createConfig({ ...base, env: {}, fileConfig: { wipeMethod: "shred" }, wipeMethod: "overwrite" }).wipeMethod
    ).toBe("overwrite");
  });
});
