/**
 * Authentication Types
 * Single source of truth for all auth-related types
 */

/** SchweizMobil account login */
export interface Credentials {
  username: string;
  password: string;
}

/** Credential fields gathered so far; either may still be missing */
export type PartialCredentials = Partial<Credentials>;
