import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { EXIT_FAILURE, hintFor, reportError } from "../src/error-handler.js";
import {
  CredentialUnavailableError,
  CyclicSpecificationError,
  SpecificationNotFoundError,
  UnresolvedPlaceholderError,
  ValidationError,
  WipeFailedError,
} from "../src/errors.js";
import { disableQuietMode, enableQuietMode } from "../src/logger.js";

beforeAll(() => {
  enableQuietMode();
});

afterAll(() => {
  disableQuietMode();
});

describe("hintFor", () => {
  it("lists the searched directories for a missing specification", () => {
    expect(hintFor(new SpecificationNotFoundError("app", ["/a", "/b"]))).toBe(
      "Searched:\n  /a\n  /b\nAdd a directory with --spec-dir or DOCKSPEC_PATH."
    );
  });

  it("explains how to supply a placeholder value", () => {
    expect(hintFor(new UnresolvedPlaceholderError("app", "TAG"))).toBe(
      "Pass --set TAG=<value>, export DOCKSPEC_VAR_TAG, or declare '#@ default TAG=<value>' in the specification."
    );
  });

  it("has hints for cycles and credentials", () => {
    expect(hintFor(new CyclicSpecificationError("a", ["a", "a"]))).toBe(
      "Remove one of the include directives along the cycle."
    );
    expect(hintFor(new CredentialUnavailableError("CREDENTIAL_USER", "prompt aborted"))).toBe(
      "Credentials are only read from an interactive terminal. No Dockerfile was written."
    );
  });

  it("has no hint for unknown errors", () => {
    expect(hintFor(new Error("boom"))).toBeUndefined();
  });
});

describe("reportError", () => {
  it.each([
    new ValidationError("bad"),
    new WipeFailedError("/work/Dockerfile", "permission denied"),
    new UnresolvedPlaceholderError("app", "TAG"),
    new Error("unexpected"),
  ])("returns a failure exit code for %s", (error) => {
    expect(reportError(error, "build 'app'")).toBe(EXIT_FAILURE);
  });
});
