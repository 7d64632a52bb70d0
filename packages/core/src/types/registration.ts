/**
 * Outcome of a provider registration call
 *
 * - accepted: the provider started monitoring the number; it may report the carrier it resolved
 * - already-registered: the provider already monitors the number (treated as success)
 * - rejected: the provider refused the number for another reason
 *
 * Transport failures and malformed payloads are thrown as ProviderError instead.
 */
export type RegistrationOutcome =
  | { status: 'accepted'; carrierCode?: number; raw: unknown }
  | { status: 'already-registered'; raw: unknown }
  | { status: 'rejected'; code: number; message: string; raw: unknown };
