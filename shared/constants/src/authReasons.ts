/**
 * Auth Reasons
 * 
 * Why a login response was produced instead of the requested resource.
 * - required: no authentication was attempted.
 * - notPermitted: credentials were presented but access is still denied.
 */
export type AuthReason = 'required' | 'notPermitted';

export const AUTH_REASONS = {
    REQUIRED: 'required',
    NOT_PERMITTED: 'notPermitted'
} as const satisfies Record<string, AuthReason>;
