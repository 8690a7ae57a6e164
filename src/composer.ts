/**
 * Template composer: merges a specification and its transitive includes.
 *
 * Includes are ordered by a three-colour depth-first traversal driven by an
 * explicit stack. Each specification is emitted once, after everything it
 * includes (post-order). Plain placeholders are substituted afterwards;
 * secret placeholders stay in the text for the credential injector.
 */

import { CyclicSpecificationError, UnresolvedPlaceholderError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { findPlaceholders, replacePlaceholders, scanPlaceholders } from "./placeholders.js";
import type { SpecStore } from "./spec-store.js";
import type { Specification } from "./types/specification.js";
import { isSecretKey } from "./validation.js";

/** Composed text with plain placeholders filled in. */
export interface CompositionResult {
  root: string;
  /** Specification names in emission order. */
  specifications: string[];
  text: string;
  /** Distinct secret keys in first-appearance order. */
  pendingSecrets: string[];
}

type VisitState = "in-progress" | "done";

interface Frame {
  spec: Specification;
  next: number;
}

/**
 * Post-order of the include graph rooted at `rootName`.
 *
 * @throws CyclicSpecificationError naming the cycle.
 * @throws SpecificationNotFoundError for a missing include.
 */
export function orderSpecifications(rootName: string, store: SpecStore): Specification[] {
  const state = new Map<string, VisitState>();
  const emitted: Specification[] = [];

  const root = store.find(rootName);
  const stack: Frame[] = [{ spec: root, next: 0 }];
  state.set(root.name, "in-progress");

  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    const childName = frame.spec.includes[frame.next];
    if (childName === undefined) {
      stack.pop();
      state.set(frame.spec.name, "done");
      emitted.push(frame.spec);
      continue;
    }
    frame.next++;

    const childState = state.get(childName);
    if (childState === "done") {continue;}
    if (childState === "in-progress") {
      const start = stack.findIndex((f) => f.spec.name === childName);
      const cycle = [...stack.slice(start).map((f) => f.spec.name), childName];
      throw new CyclicSpecificationError(rootName, cycle);
    }

    const child = store.find(childName, frame.spec.name);
    state.set(childName, "in-progress");
    stack.push({ spec: child, next: 0 });
  }

  return emitted;
}

/**
 * Plain placeholder values: caller variables first, then declared defaults.
 * Among defaults the latest emitted specification wins, so an including
 * specification overrides the ones it includes.
 */
function collectValues(
  ordered: readonly Specification[],
  variables: ReadonlyMap<string, string>
): Map<string, string> {
  const values = new Map<string, string>();
  for (const spec of ordered) {
    for (const [key, value] of spec.defaults) {
      values.set(key, value);
    }
  }
  for (const [key, value] of variables) {
    values.set(key, value);
  }
  return values;
}

/**
 * Compose a specification into Dockerfile text.
 *
 * @param variables - Caller-supplied plain placeholder values.
 * @throws UnresolvedPlaceholderError for a plain key without a value.
 * @throws ValidationError when a value itself contains placeholder markup.
 */
export function compose(
  rootName: string,
  store: SpecStore,
  variables: ReadonlyMap<string, string> = new Map()
): CompositionResult {
  const ordered = orderSpecifications(rootName, store);
  const values = collectValues(ordered, variables);

  for (const spec of ordered) {
    for (const key of spec.placeholders.plain) {
      const value = values.get(key);
      if (value === undefined) {
        throw new UnresolvedPlaceholderError(spec.name, key);
      }
      // Values are inserted as text; they never contribute placeholders
      if (findPlaceholders(value).length > 0) {
        throw new ValidationError(`Value for placeholder '${key}' must not contain '{{ KEY }}' markup`);
      }
    }
  }

  const fragments = ordered.flatMap((spec) => spec.fragments);
  const merged = fragments.length > 0 ? `${fragments.join("\n")}\n` : "";
  const { secret } = scanPlaceholders([merged]);
  const text = replacePlaceholders(merged, (key) => (isSecretKey(key) ? undefined : values.get(key)));

  log.debug(`Composition order: ${ordered.map((s) => s.name).join(", ")}`);

  return {
    root: rootName,
    specifications: ordered.map((s) => s.name),
    text,
    pendingSecrets: secret,
  };
}
