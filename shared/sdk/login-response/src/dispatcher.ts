import { LOGIN_METHODS, LOGIN_OUTCOMES, LoginOutcome } from '@loginwall/constants';
import { logger as defaultLogger, Logger } from '@loginwall/service-template';
import {
    ChallengeResponder,
    ContentResponder,
    DeniedRequest,
    DeniedResponse,
    LoginResponseConfig,
    Resource,
    ResourceResolver,
    ResponseClassifier
} from './types';
import { LoginResponseConfigInput, resolveLoginResponseConfig } from './config';
import { PathExclusionMatcher } from './exclusion';
import { ContentTypeClassifier } from './classifier';
import { PageResponseWriter } from './pageWriter';
import { writeStructuredResponse } from './structuredWriter';

export interface LoginResponseDispatcherOptions {
    resourceResolver: ResourceResolver;
    contentResponder: ContentResponder;
    challengeResponder: ChallengeResponder;
    classifier?: ResponseClassifier;
    config?: LoginResponseConfigInput;
    logger?: Logger;
}

/**
 * Entry point called by the host whenever access to a resource is denied.
 *
 * Chooses between the standard challenge, a login page and a JSON payload.
 * Holds only frozen configuration, so one instance serves concurrent
 * requests; per-request state lives in `request.attributes`.
 */
export class LoginResponseDispatcher {
    private readonly config: LoginResponseConfig;
    private readonly exclusions: PathExclusionMatcher;
    private readonly classifier: ResponseClassifier;
    private readonly pageWriter: PageResponseWriter;
    private readonly challengeResponder: ChallengeResponder;
    private readonly logger: Logger;
    readonly resourceResolver: ResourceResolver;

    constructor(options: LoginResponseDispatcherOptions) {
        this.config = resolveLoginResponseConfig(options.config);
        this.logger = options.logger || defaultLogger;
        this.exclusions = new PathExclusionMatcher(this.config.excludePaths);
        this.classifier = options.classifier || new ContentTypeClassifier(this.logger);
        this.challengeResponder = options.challengeResponder;
        this.resourceResolver = options.resourceResolver;
        this.pageWriter = new PageResponseWriter({
            loginPage: this.config.loginPage,
            resourceResolver: options.resourceResolver,
            contentResponder: options.contentResponder,
            challengeResponder: options.challengeResponder,
            logger: this.logger
        });
    }

    get enabled(): boolean {
        return this.config.enabled;
    }

    get loginPage(): string {
        return this.config.loginPage;
    }

    get excludePaths(): readonly string[] {
        return this.config.excludePaths;
    }

    async handleDenied(resource: Resource, response: DeniedResponse, request: DeniedRequest): Promise<LoginOutcome> {
        const outcome = await this.dispatch(resource, response, request);
        this.logger.info(`Access denied, responded with ${outcome}`, {
            method: request.method,
            path: request.absolutePath,
            outcome
        });
        return outcome;
    }

    private async dispatch(resource: Resource, response: DeniedResponse, request: DeniedRequest): Promise<LoginOutcome> {
        if (this.config.enabled && !this.exclusions.isExcluded(request) && LOGIN_METHODS.includes(request.method)) {
            if (this.classifier.canLogin(resource, request)) {
                return this.pageWriter.respond(resource, response, request);
            }
            if (this.classifier.isAjax(resource, request)) {
                writeStructuredResponse(request, response);
                return LOGIN_OUTCOMES.PAYLOAD;
            }
        }

        this.logger.debug('Responding with standard challenge');
        await this.challengeResponder.respondUnauthorised(resource, response, request);
        return LOGIN_OUTCOMES.CHALLENGE;
    }
}
