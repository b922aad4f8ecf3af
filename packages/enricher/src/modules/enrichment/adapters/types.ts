/**
 * Gateway types for the two-stage enrichment module.
 *
 * The orchestrator only depends on `EnrichmentGateway`, so it can run
 * against the Apollo HTTP adapter or an in-process stand-in.
 */

/** Opaque person object returned under the `person` key. */
export type PersonPayload = Record<string, unknown>;

/** Result of a single raw call to the people-data API. */
export interface ApolloResult {
  /** Whether the call returned a 2xx JSON object. */
  success: boolean;
  /** Parsed response body, or null on failure. */
  data: Record<string, unknown> | null;
  /** Failure reason when success is false. */
  error?: string;
}

/** The two remote lookups the orchestrator needs. */
export interface EnrichmentGateway {
  /**
   * Identity match by LinkedIn URL. Resolves to null when nothing matched
   * or the call failed; never rejects.
   */
  match(linkedinUrl: string): Promise<PersonPayload | null>;

  /**
   * Credit-consuming mobile unlock for a known person id. Resolves to null
   * when the call failed or returned no person; never rejects.
   */
  unlockMobile(personId: string): Promise<PersonPayload | null>;
}
