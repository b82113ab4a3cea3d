import { Express } from 'express';
import { createService } from '@loginwall/service-template';
import { LoginResponseDispatcher } from '@loginwall/login-response';
import { PortalConfig } from './config';
import { FileResourceFactory } from './host/fileResources';
import { BasicChallengeResponder, PageContentResponder } from './host/responders';
import { createRouter } from './routes';
import { errorHandler } from './middleware';

export const createPortalApp = (config: PortalConfig): Express => {
    const app = createService('portal-service');

    const dispatcher = new LoginResponseDispatcher({
        resourceResolver: new FileResourceFactory(config.pagesDir),
        contentResponder: new PageContentResponder(),
        challengeResponder: new BasicChallengeResponder(config.challengeRealm),
        config: config.loginResponse
    });

    app.use(createRouter(dispatcher, config.accessTokens));
    app.use(errorHandler);

    return app;
};
