/**
 * Identity-provider client interface
 */
export interface IdentityProviderClient {
  /**
   * Returns the parsed GraphQL body listing the first page of external
   * identities linked to `organization`. Rejects with TransportError.
   */
  fetchExternalIdentities(organization: string): Promise<unknown>;
}
