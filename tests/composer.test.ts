import { afterEach, describe, expect, it } from "vitest";

import { compose, orderSpecifications } from "../src/composer.js";
import {
  CyclicSpecificationError,
  SpecificationNotFoundError,
  UnresolvedPlaceholderError,
  ValidationError,
} from "../src/errors.js";
import { SpecStore } from "../src/spec-store.js";
import { makeTempDir, removeTempDirs, writeSpecs } from "./mocks/spec-fixtures.js";

function storeWith(specs: Record<string, string>): SpecStore {
  return new SpecStore([writeSpecs(makeTempDir(), specs)]);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected an error");
}

afterEach(() => {
  removeTempDirs();
});

describe("orderSpecifications", () => {
  it("emits includes before their includers, shared ones once", () => {
    const store = storeWith({
      base: "FROM base\n",
      lib1: "#@ include base\nRUN lib1\n",
      lib2: "#@ include base\nRUN lib2\n",
      app: "#@ include lib1 lib2\nRUN app\n",
    });

    expect(orderSpecifications("app", store).map((s) => s.name)).toEqual(["base", "lib1", "lib2", "app"]);
  });

  it("names the cycle", () => {
    const store = storeWith({
      a: "#@ include b\nRUN a\n",
      b: "#@ include c\nRUN b\n",
      c: "#@ include a\nRUN c\n",
    });

    const error = catchError(() => orderSpecifications("a", store));
    expect(error).toBeInstanceOf(CyclicSpecificationError);
    if (error instanceof CyclicSpecificationError) {
      expect(error.cycle).toEqual(["a", "b", "c", "a"]);
      expect(error.message).toBe("Cyclic include in specification 'a': a -> b -> c -> a");
    }
  });

  it("detects a specification including itself", () => {
    const error = catchError(() => orderSpecifications("a", storeWith({ a: "#@ include a\nRUN a\n" })));
    expect(error).toBeInstanceOf(CyclicSpecificationError);
    if (error instanceof CyclicSpecificationError) {
      expect(error.cycle).toEqual(["a", "a"]);
    }
  });

  it("reports only the looping part of the path", () => {
    const store = storeWith({
      root: "#@ include x\nRUN root\n",
      x: "#@ include y\nRUN x\n",
      y: "#@ include x\nRUN y\n",
    });

    const error = catchError(() => orderSpecifications("root", store));
    expect(error).toBeInstanceOf(CyclicSpecificationError);
    if (error instanceof CyclicSpecificationError) {
      expect(error.specification).toBe("root");
      expect(error.cycle).toEqual(["x", "y", "x"]);
    }
  });

  it("names the including specification of a missing include", () => {
    const error = catchError(() => orderSpecifications("a", storeWith({ a: "#@ include ghost\nRUN a\n" })));
    expect(error).toBeInstanceOf(SpecificationNotFoundError);
    if (error instanceof SpecificationNotFoundError) {
      expect(error.message).toBe("Specification not found: 'ghost' (included by 'a')");
    }
  });
});

describe("compose", () => {
  it("reproduces a directive-free bundle byte for byte", () => {
    const content = "FROM alpine\nRUN echo one\n\nRUN echo two\n";
    expect(compose("solo", storeWith({ solo: content })).text).toBe(content);
  });

  it("concatenates fragments in emission order", () => {
    const store = storeWith({
      base: "FROM base\n",
      lib1: "#@ include base\nRUN lib1\n",
      lib2: "#@ include base\nRUN lib2\n",
      app: "#@ include lib1 lib2\nRUN app\n",
    });

    const result = compose("app", store);
    expect(result.root).toBe("app");
    expect(result.specifications).toEqual(["base", "lib1", "lib2", "app"]);
    expect(result.text).toBe("FROM base\nRUN lib1\nRUN lib2\nRUN app\n");
  });

  it("fills plain placeholders from defaults", () => {
    const result = compose("img", storeWith({ img: "#@ default TAG=3.19\nFROM alpine:{{ TAG }}\nRUN echo {{TAG}}\n" }));
    expect(result.text).toBe("FROM alpine:3.19\nRUN echo 3.19\n");
  });

  it("prefers caller variables over defaults", () => {
    const store = storeWith({ img: "#@ default TAG=3.19\nFROM alpine:{{ TAG }}\n" });
    expect(compose("img", store, new Map([["TAG", "edge"]])).text).toBe("FROM alpine:edge\n");
  });

  it("lets an including specification override an included default", () => {
    const store = storeWith({
      base: "#@ default TAG=1\nFROM x:{{ TAG }}\n",
      app: "#@ include base\n#@ default TAG=2\nRUN y\n",
    });
    expect(compose("app", store).text).toBe("FROM x:2\nRUN y\n");
  });

  it("inserts values literally", () => {
    const store = storeWith({ img: "RUN echo {{ MSG }}\n" });
    expect(compose("img", store, new Map([["MSG", "a$&b $1"]])).text).toBe("RUN echo a$&b $1\n");
  });

  it("leaves shell and Dockerfile variables alone", () => {
    const content = "ENV PATH=/opt/bin:$PATH\nRUN echo ${HOME}\n";
    expect(compose("img", storeWith({ img: content })).text).toBe(content);
  });

  it("names the specification that uses an unresolved placeholder", () => {
    const store = storeWith({
      base: "FROM {{ MISSING }}\n",
      app: "#@ include base\nRUN app\n",
    });

    const error = catchError(() => compose("app", store));
    expect(error).toBeInstanceOf(UnresolvedPlaceholderError);
    if (error instanceof UnresolvedPlaceholderError) {
      expect(error.specification).toBe("base");
      expect(error.placeholder).toBe("MISSING");
    }
  });

  it.each(["{{ CREDENTIAL_X }}", "prefix {{OTHER}}"])("refuses a value carrying markup: %j", (value) => {
    const store = storeWith({ img: "RUN echo {{ MSG }} {{ CREDENTIAL_TOKEN }}\n" });

    expect(() => compose("img", store, new Map([["MSG", value], ["OTHER", "x"]]))).toThrow(ValidationError);
    expect(() => compose("img", store, new Map([["MSG", value], ["OTHER", "x"]]))).toThrow(
      "Value for placeholder 'MSG' must not contain '{{ KEY }}' markup"
    );
  });

  it("collects credential placeholders from the bundles only", () => {
    const store = storeWith({ img: "RUN echo {{ MSG }} {{ CREDENTIAL_TOKEN }}\n" });

    const result = compose("img", store, new Map([["MSG", "{ CREDENTIAL_X }"]]));

    expect(result.text).toBe("RUN echo { CREDENTIAL_X } {{ CREDENTIAL_TOKEN }}\n");
    expect(result.pendingSecrets).toEqual(["CREDENTIAL_TOKEN"]);
  });

  it("leaves credential placeholders for the injector", () => {
    const content = "RUN login {{ CREDENTIAL_USER }} {{CREDENTIAL_PASS}} {{ CREDENTIAL_USER }}\n";
    const result = compose("img", storeWith({ img: content }));

    expect(result.text).toBe(content);
    expect(result.pendingSecrets).toEqual(["CREDENTIAL_USER", "CREDENTIAL_PASS"]);
  });

  it("produces an empty text for a bundle with directives only", () => {
    expect(compose("empty", storeWith({ empty: "#@ description Nothing\n" })).text).toBe("");
  });
});
