/**
 * @courtsync/courtlistener-client
 *
 * ## Usage
 *
 * ```typescript
 * import { createCourtListenerClient } from '@courtsync/courtlistener-client';
 *
 * const client = createCourtListenerClient();
 * for await (const opinion of client.opinions({ date_filed_min: '2024-01-01' })) {
 *   console.log(opinion.id);
 * }
 * ```
 *
 * ## Environment Variables
 *
 * - `COURTLISTENER_API_BASE` - Base URL (default: https://www.courtlistener.com/api/rest/v3)
 * - `COURTLISTENER_UA` - User-Agent sent with every request
 * - `COURTLISTENER_TOKEN` - API token
 * - `COURTLISTENER_MAX_RETRIES` - Attempts per page (default: 6)
 * - `COURTLISTENER_TIMEOUT` - Request timeout in seconds (default: 60)
 * - `COURTLISTENER_BACKOFF_FACTOR` - Backoff base in seconds (default: 1.5)
 * - `COURTLISTENER_MAX_RPS` - Client-side request rate cap
 */

export {
  CourtListenerClient,
  createCourtListenerClient,
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
} from './courtListenerClient';

export type {
  CourtListenerClientConfig,
  FilterValue,
  Opinion,
  OpinionFilters,
  QueryFilters,
} from './types';
