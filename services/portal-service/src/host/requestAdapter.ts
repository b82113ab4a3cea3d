import { Request, Response } from 'express';
import { HTTP_HEADERS } from '@loginwall/constants';
import { Authorization, DeniedRequest, DeniedResponse } from '@loginwall/login-response';

// The scheme word ("Basic", "Bearer", ...) marks an authentication attempt.
const parseAuthorization = (header: string | undefined): Authorization | undefined => {
    const scheme = header?.trim().split(/\s+/)[0];
    return scheme ? { tag: scheme } : undefined;
};

/**
 * View of an express request for the login layer. The attribute bag is
 * `res.locals`, so anything stored there is visible to later renderers.
 */
export const toDeniedRequest = (req: Request, res: Response): DeniedRequest => {
    const authorization = parseAuthorization(req.get(HTTP_HEADERS.AUTHORIZATION));
    return {
        method: req.method,
        absolutePath: req.originalUrl.split('?')[0],
        acceptHeader: req.get(HTTP_HEADERS.ACCEPT),
        ...(authorization && { authorization }),
        hostHeader: req.get('Host') || '',
        attributes: res.locals
    };
};

export const toDeniedResponse = (res: Response): DeniedResponse => ({
    setStatus: (status) => {
        res.status(status);
    },
    setCacheControlNoCacheHeader: () => {
        res.setHeader(HTTP_HEADERS.CACHE_CONTROL, 'no-cache');
    },
    setContentLengthHeader: (length) => {
        res.setHeader(HTTP_HEADERS.CONTENT_LENGTH, String(length));
    },
    setContentTypeHeader: (contentType) => {
        res.setHeader(HTTP_HEADERS.CONTENT_TYPE, contentType);
    },
    setAuthenticateHeader: (challenge) => {
        res.setHeader(HTTP_HEADERS.WWW_AUTHENTICATE, challenge);
    },
    getOutputStream: () => res
});
