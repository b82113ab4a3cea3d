import { LOGIN_OUTCOMES, LoginOutcome } from '@loginwall/constants';
import { logger as defaultLogger, Logger } from '@loginwall/service-template';
import {
    ChallengeResponder,
    ContentResponder,
    ContentResource,
    DeniedRequest,
    DeniedResponse,
    Resource,
    ResourceResolver,
    isContentResource
} from './types';
import { LoginPageError, NotFoundError } from './errors';
import { resolveAuthReason } from './authReason';

export interface PageResponseWriterOptions {
    loginPage: string;
    resourceResolver: ResourceResolver;
    contentResponder: ContentResponder;
    challengeResponder: ChallengeResponder;
    logger?: Logger;
}

/**
 * Serves the configured login page in place of the denied resource.
 *
 * A login page that is missing or cannot produce content downgrades to the
 * standard challenge. Any other failure while looking up or rendering the
 * page is raised as a LoginPageError.
 */
export class PageResponseWriter {
    private readonly loginPage: string;
    private readonly resourceResolver: ResourceResolver;
    private readonly contentResponder: ContentResponder;
    private readonly challengeResponder: ChallengeResponder;
    private readonly logger: Logger;

    constructor(options: PageResponseWriterOptions) {
        this.loginPage = options.loginPage;
        this.resourceResolver = options.resourceResolver;
        this.contentResponder = options.contentResponder;
        this.challengeResponder = options.challengeResponder;
        this.logger = options.logger || defaultLogger;
    }

    async respond(resource: Resource, response: DeniedResponse, request: DeniedRequest): Promise<LoginOutcome> {
        const page = await this.findLoginPage(request);
        if (!page) {
            this.logger.info(`Couldn't find login resource: ${request.hostHeader}${this.loginPage}`);
            await this.challengeResponder.respondUnauthorised(resource, response, request);
            return LOGIN_OUTCOMES.CHALLENGE;
        }

        // The page renderer reads this to tell "log in" from "not allowed"
        request.attributes.authReason = resolveAuthReason(request);

        this.logger.debug(`Responding with login page ${page.name} to suppress the credential prompt`);
        try {
            await this.contentResponder.respondContent(page, response, request, null);
        } catch (error) {
            throw new LoginPageError(`Failed to render login page ${this.loginPage}`, this.loginPage, error);
        }
        return LOGIN_OUTCOMES.PAGE;
    }

    private async findLoginPage(request: DeniedRequest): Promise<ContentResource | undefined> {
        let found: Resource | undefined;
        try {
            found = await this.resourceResolver.resolve(request.hostHeader, this.loginPage);
        } catch (error) {
            if (error instanceof NotFoundError) {
                return undefined;
            }
            throw new LoginPageError(`Failed to look up login page ${this.loginPage}`, this.loginPage, error);
        }

        if (!found || !isContentResource(found)) {
            return undefined;
        }
        return found;
    }
}
