/**
 * Login Outcomes
 * 
 * Exactly one is chosen for every denied-access event.
 * - challenge: the host's standard denial (401 + WWW-Authenticate).
 * - page: a rendered human login page, served with the page's own status.
 * - payload: a compact JSON object for scripted clients, served with 400.
 */
export type LoginOutcome = 'challenge' | 'page' | 'payload';

export const LOGIN_OUTCOMES = {
    CHALLENGE: 'challenge',
    PAGE: 'page',
    PAYLOAD: 'payload'
} as const satisfies Record<string, LoginOutcome>;
