/**
 * dockspec - compose named Dockerfile specifications and wipe the result.
 *
 * This is the library entry point of the dockspec package.
 */

export { VERSION, DOCKSPEC_ENV, SECRET_KEY_PREFIX, SPEC_FILE_SUFFIX } from "./constants.js";
export { createConfig, searchPathFor, type EngineConfig, type ConfigInput } from "./config.js";
export { loadDockspecConfig, type DockspecFileConfig } from "./config-file.js";
export { resolveSearchPath, type SearchPath, type SearchPathInput } from "./search-path.js";
export { SpecStore } from "./spec-store.js";
export { parseSpecification } from "./spec-parser.js";
export { compose, orderSpecifications, type CompositionResult } from "./composer.js";
export { injectCredentials, type InjectedComposition } from "./credentials.js";
export { SecretManifest, redactText, type SecretOccurrence } from "./manifest.js";
export { SecretValue } from "./secret-value.js";
export {
  buildArtifact,
  composeSpecification,
  describeSpecification,
  listSpecifications,
  type BuildResult,
} from "./engine.js";
export { wipeArtifact, resolveArtifactPath, type WipeResult, type WipeStatus } from "./wipe.js";
export { TerminalCredentialSource } from "./prompt-io.js";
export type { CredentialRequest, CredentialSource } from "./interfaces/credential-source.js";
export type { Specification, SpecSummary, PlaceholderSets } from "./types/specification.js";
export type { WipeMethod, WipeOptions } from "./types/options.js";
export {
  DockspecError,
  ConfigError,
  ValidationError,
  SpecificationNotFoundError,
  CyclicSpecificationError,
  UnresolvedPlaceholderError,
  CredentialUnavailableError,
  ArtifactWriteFailedError,
  WipeFailedError,
  InvalidSpecificationError,
} from "./errors.js";
