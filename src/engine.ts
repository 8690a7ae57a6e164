/**
 * Composition engine: resolves, composes, injects and writes.
 *
 * Each call builds its own search path, store, composition and manifest;
 * nothing is cached between runs. Any failure aborts before the write, so
 * no partial Dockerfile is ever left behind.
 */

import { join } from "node:path";

import { writeArtifact } from "./artifact.js";
import { compose, orderSpecifications, type CompositionResult } from "./composer.js";
import { searchPathFor, type EngineConfig } from "./config.js";
import { DOCKERFILE_NAME, NO_SAFE_REMOVAL_MESSAGE } from "./constants.js";
import { injectCredentials } from "./credentials.js";
import { ConfigError } from "./errors.js";
import type { CredentialSource } from "./interfaces/credential-source.js";
import { log } from "./logger.js";
import type { SecretManifest } from "./manifest.js";
import { findSafeRemovalUtility } from "./platform.js";
import { TerminalCredentialSource } from "./prompt-io.js";
import { SpecStore } from "./spec-store.js";
import type { Specification, SpecSummary } from "./types/specification.js";

/** Outcome of a successful build. */
export interface BuildResult {
  /** Absolute path of the written Dockerfile. */
  path: string;
  /** Injected secrets; hand to wipeArtifact() once the image is built. */
  manifest: SecretManifest;
  /** Specification names in emission order. */
  specifications: string[];
}

export function createStore(config: EngineConfig): SpecStore {
  const searchPath = searchPathFor(config);
  log.debug(`Search path: ${searchPath.join(":")}`);
  return new SpecStore(searchPath);
}

/**
 * Compose without prompting or writing; secret placeholders stay in place.
 */
export function composeSpecification(name: string, config: EngineConfig): CompositionResult {
  return compose(name, createStore(config), config.variables);
}

/**
 * A shred wipe needs its utility; check before any credential is asked for.
 */
function assertWipeable(composition: CompositionResult, config: EngineConfig): void {
  if (config.wipeMethod !== "shred" || composition.pendingSecrets.length === 0) {return;}
  if (!findSafeRemovalUtility(config.env)) {
    throw new ConfigError(`wipeMethod is shred but ${NO_SAFE_REMOVAL_MESSAGE}; no credentials were requested`);
  }
}

/**
 * Build the Dockerfile for specification `name`.
 *
 * @param credentials - Source of secret placeholder values (default: terminal prompt).
 * @throws ConfigError when wipeMethod is shred and its utility is missing.
 */
export async function buildArtifact(
  name: string,
  config: EngineConfig,
  credentials: CredentialSource = new TerminalCredentialSource()
): Promise<BuildResult> {
  const composition = composeSpecification(name, config);
  assertWipeable(composition, config);
  const injected = await injectCredentials(composition, credentials);
  const path = join(config.outputDir, DOCKERFILE_NAME);

  try {
    writeArtifact(path, injected.text);
  } catch (error: unknown) {
    injected.manifest.clear();
    throw error;
  }

  log.debug(`Wrote ${path} from ${injected.specifications.length} specification(s)`);
  return { path, manifest: injected.manifest, specifications: injected.specifications };
}

/** A specification together with its full include order. */
export interface SpecificationDetails {
  spec: Specification;
  order: string[];
}

export function describeSpecification(name: string, config: EngineConfig): SpecificationDetails {
  const store = createStore(config);
  const spec = store.find(name);
  const order = orderSpecifications(name, store).map((s) => s.name);
  return { spec, order };
}

export function listSpecifications(config: EngineConfig): SpecSummary[] {
  return createStore(config).list();
}
