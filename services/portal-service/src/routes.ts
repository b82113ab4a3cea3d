import { Router, Request, Response, NextFunction } from 'express';
import { LoginResponseDispatcher, ResourceResolver, isContentResource } from '@loginwall/login-response';
import { createAccessGuard, protect } from './middleware';
import { RouteResource } from './host/fileResources';
import { toDeniedRequest, toDeniedResponse } from './host/requestAdapter';
import { PageContentResponder } from './host/responders';

// Public pages, the login page among them
export const servePages = (resolver: ResourceResolver, responder: PageContentResponder) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        if (req.method !== 'GET') {
            return next();
        }
        try {
            const page = await resolver.resolve(req.get('Host') || '', req.path);
            if (!page || !isContentResource(page)) {
                return next();
            }
            await responder.respondContent(page, toDeniedResponse(res), toDeniedRequest(req, res), null);
            res.end();
        } catch (error) {
            next(error);
        }
    };
};

export const createRouter = (dispatcher: LoginResponseDispatcher, accessTokens: readonly string[]): Router => {
    const router = Router();
    const guard = createAccessGuard(accessTokens);

    // Browser area: the route declares no type, so the Accept header decides
    router.use('/app', protect(guard, dispatcher, (req) => new RouteResource(req.originalUrl.split('?')[0])));
    router.get('/app/profile', (req: Request, res: Response) => {
        res.type('html').send('<!doctype html><title>Profile</title><h1>Profile</h1>');
    });

    // Scripted clients
    router.use('/api', protect(guard, dispatcher, (req) => new RouteResource(req.originalUrl.split('?')[0], 'application/json')));
    router.get('/api/profile', (req: Request, res: Response) => {
        res.json({ authenticated: true });
    });

    router.use(servePages(dispatcher.resourceResolver, new PageContentResponder()));

    return router;
};
