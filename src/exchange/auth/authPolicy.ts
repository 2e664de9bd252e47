import type { AuthGrant, AuthProvider } from '../types';

export const DEFAULT_TOKEN_REFRESH_LEAD_MS = 60_000;

/** Public-only venues: nothing to fetch, the endpoint is fixed. */
export function createStaticAuthProvider(endpoint: string): AuthProvider {
    return {
        tokenGated: false,
        acquire: async () => ({ endpoint }),
    };
}

/**
 * Moment after which a grant counts as expired: the stated expiry minus the refresh lead.
 * Grants without expiry never expire.
 */
export function effectiveExpiry(grant: AuthGrant, leadMs = DEFAULT_TOKEN_REFRESH_LEAD_MS): number | undefined {
    if (grant.expiresAt === undefined) return undefined;
    return grant.expiresAt - Math.max(0, leadMs);
}

export function isGrantUsable(grant: AuthGrant | null, now: number, leadMs = DEFAULT_TOKEN_REFRESH_LEAD_MS): boolean {
    if (!grant) return false;
    const expiry = effectiveExpiry(grant, leadMs);
    return expiry === undefined || now < expiry;
}
