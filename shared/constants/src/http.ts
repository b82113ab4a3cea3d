/**
 * Request attribute keys shared between the login layer and page renderers.
 */
export const LOGIN_ATTRIBUTES = {
    AUTH_REASON: 'authReason',
    LOGIN_RESULT: 'loginResult',
    USER_URL: 'userUrl'
} as const;

// Only these may be answered with a login page or payload.
export const LOGIN_METHODS: readonly string[] = ['GET', 'POST'];

export const HTTP_HEADERS = {
    ACCEPT: 'Accept',
    AUTHORIZATION: 'Authorization',
    CACHE_CONTROL: 'Cache-Control',
    CONTENT_LENGTH: 'Content-Length',
    CONTENT_TYPE: 'Content-Type',
    WWW_AUTHENTICATE: 'WWW-Authenticate'
} as const;

export const DEFAULT_LOGIN_PAGE = '/login.html';
