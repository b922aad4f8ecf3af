import { z } from 'zod';
import { logger } from '../../../shared/logger';
import type { ApolloResult, EnrichmentGateway, PersonPayload } from './types';

export const MATCH_ENDPOINT = 'people/match';
export const MOBILE_UNLOCK_ENDPOINT = 'people/mobile/search';

const DEFAULT_BASE_URL = 'https://api.apollo.io/v1/';
const DEFAULT_TIMEOUT_MS = 10_000;

const responseBodySchema = z.record(z.string(), z.unknown());
const personEnvelopeSchema = z.object({
  person: z.record(z.string(), z.unknown()).nullish(),
});

/** The slice of the fetch API the adapter relies on. */
export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
  },
) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}>;

export interface ApolloAdapterConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchFn?: FetchLike;
}

export interface ApolloAdapter extends EnrichmentGateway {
  callApollo(endpoint: string, body: Record<string, unknown>): Promise<ApolloResult>;
}

/**
 * Apollo people-data adapter.
 *
 * POSTs JSON to `people/match` and `people/mobile/search` with a fixed
 * timeout. Transport failures never reject: `callApollo` reports them in
 * the result and the gateway methods resolve to null after a warning.
 */
export function createApolloAdapter(config: ApolloAdapterConfig): ApolloAdapter {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchFn: FetchLike = config.fetchFn ?? fetch;

  async function callApollo(
    endpoint: string,
    body: Record<string, unknown>,
  ): Promise<ApolloResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchFn(baseUrl + endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Api-Key': config.apiKey,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text().catch(() => 'Unknown error');
        return {
          success: false,
          data: null,
          error: `Apollo API error ${response.status}: ${text}`,
        };
      }

      const parsed = responseBodySchema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, data: null, error: 'Apollo API returned a non-object body' };
      }

      return { success: true, data: parsed.data };
    } catch (err: unknown) {
      const message =
        err instanceof Error && err.name === 'AbortError'
          ? `Apollo API request timed out after ${timeoutMs}ms`
          : err instanceof Error
            ? err.message
            : 'Unknown error calling Apollo API';

      return { success: false, data: null, error: message };
    } finally {
      clearTimeout(timer);
    }
  }

  async function fetchPerson(
    endpoint: string,
    body: Record<string, unknown>,
  ): Promise<PersonPayload | null> {
    const result = await callApollo(endpoint, body);

    if (!result.success) {
      logger.warn('Apollo request failed', { endpoint, error: result.error });
      return null;
    }

    const envelope = personEnvelopeSchema.safeParse(result.data);
    const person = envelope.success ? envelope.data.person : null;
    if (!person || Object.keys(person).length === 0) {
      logger.debug('Apollo response carried no person', { endpoint });
      return null;
    }

    return person;
  }

  return {
    callApollo,

    match(linkedinUrl) {
      return fetchPerson(MATCH_ENDPOINT, {
        linkedin_url: linkedinUrl,
        match_on_website: true,
      });
    },

    unlockMobile(personId) {
      return fetchPerson(MOBILE_UNLOCK_ENDPOINT, {
        id: personId,
        mobile_phone_only: true,
      });
    },
  };
}
