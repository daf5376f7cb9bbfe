/**
 * Current access token. Replaced as a whole on every login, never mutated.
 */
export interface AccessToken {
  readonly value: string;
  readonly issuedAt: number; // Unix timestamp (ms)
  readonly expiresAt: number; // Unix timestamp (ms)
}
