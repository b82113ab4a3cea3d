import { Request, Response, NextFunction } from 'express';
import { logger } from '@loginwall/service-template';
import { HTTP_HEADERS } from '@loginwall/constants';
import { BadRequestError, LoginPageError, LoginResponseDispatcher, Resource } from '@loginwall/login-response';
import { toDeniedRequest, toDeniedResponse } from './host/requestAdapter';

export type AccessGuard = (req: Request) => boolean | Promise<boolean>;
export type ResourceLocator = (req: Request) => Resource | Promise<Resource>;

// Stand-in for real credential checks: a bearer token from a fixed list.
export const createAccessGuard = (tokens: readonly string[]): AccessGuard => {
    return (req: Request) => {
        const header = req.get(HTTP_HEADERS.AUTHORIZATION);
        if (!header || !header.startsWith('Bearer ')) {
            return false;
        }
        return tokens.includes(header.slice('Bearer '.length).trim());
    };
};

// --- Middleware: protect ---
export const protect = (guard: AccessGuard, dispatcher: LoginResponseDispatcher, locateResource: ResourceLocator) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            if (await guard(req)) {
                return next();
            }

            const resource = await locateResource(req);
            await dispatcher.handleDenied(resource, toDeniedResponse(res), toDeniedRequest(req, res));
            if (!res.writableEnded) {
                res.end();
            }
        } catch (error) {
            next(error);
        }
    };
};

// --- Error handler: 400 for bad page paths, otherwise the host's generic 500 ---
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof LoginPageError) {
        logger.error('Login page could not be produced', {
            loginPage: err.loginPage,
            path: req.originalUrl,
            cause: err.cause instanceof Error ? `${err.cause.name}: ${err.cause.message}` : String(err.cause)
        });
    } else if (err instanceof BadRequestError) {
        logger.warn('Bad request', { path: req.originalUrl, error: err.message });
        if (!res.headersSent) {
            res.status(400).json({ error: 'Bad Request' });
            return;
        }
    } else {
        logger.error('Request failed', { path: req.originalUrl, error: err instanceof Error ? err.message : String(err) });
    }

    if (res.headersSent) {
        return next(err);
    }
    res.status(500).json({ error: 'Internal Server Error' });
};
