/**
 * Credential source interface for dockspec.
 *
 * Defines the contract for obtaining secret placeholder values.
 * Enables dependency injection and testability.
 */

/** What the injector asks for. */
export interface CredentialRequest {
  /** Placeholder key, e.g. CREDENTIAL_GITHUB_TOKEN */
  key: string;
  /** Read without echoing (passwords, tokens) */
  hidden: boolean;
}

/**
 * Interface for obtaining credential values.
 * Implementations return undefined (or throw CredentialUnavailableError)
 * when no value can be obtained.
 */
export interface CredentialSource {
  obtain(request: CredentialRequest): Promise<string | undefined>;
}
