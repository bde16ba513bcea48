/**
 * Outcome of an authenticated probe request
 *
 * - accepted: status below 400
 * - rejected: the server refused the token (401/403)
 * - inconclusive: anything else, including transport failures
 */
export type ProbeOutcome = 'accepted' | 'rejected' | 'inconclusive';

export interface ProbeResult {
  outcome: ProbeOutcome;
  status?: number;
  error?: unknown;
}
