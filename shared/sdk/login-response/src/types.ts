import { Writable } from 'stream';
import { AuthReason } from '@loginwall/constants';

/**
 * Request-scoped values a login page renderer or a scripted client may read.
 * Lives on the request, never shared between requests.
 */
export interface LoginAttributes {
    authReason?: AuthReason;
    loginResult?: boolean;
    userUrl?: string;
    [key: string]: unknown;
}

export interface Authorization {
    // Non-empty when an authentication attempt was made
    tag?: string;
}

export interface DeniedRequest {
    method: string;
    absolutePath: string;
    acceptHeader?: string;
    authorization?: Authorization;
    hostHeader: string;
    attributes: LoginAttributes;
}

export interface DeniedResponse {
    setStatus(status: number): void;
    setCacheControlNoCacheHeader(): void;
    setContentLengthHeader(length: number): void;
    setContentTypeHeader(contentType: string): void;
    setAuthenticateHeader(challenge: string): void;
    getOutputStream(): Writable;
}

export interface Resource {
    name: string;
}

export interface ByteRange {
    start: number;
    finish?: number;
}

/**
 * A resource that can stream its own bytes.
 */
export interface ContentResource extends Resource {
    /**
     * Content type of this resource, given the preferred type. Undefined when
     * the resource does not declare one.
     */
    getContentType(preferred: string): string | undefined;
    sendContent(out: Writable, range: ByteRange | null, attributes: LoginAttributes): Promise<void>;
}

export const isContentResource = (resource: Resource): resource is ContentResource => {
    return 'getContentType' in resource && typeof resource.getContentType === 'function'
        && 'sendContent' in resource && typeof resource.sendContent === 'function';
};

export interface ResourceResolver {
    resolve(hostHeader: string, logicalPath: string): Promise<Resource | undefined>;
}

export interface ContentResponder {
    respondContent(resource: ContentResource, response: DeniedResponse, request: DeniedRequest, range: ByteRange | null): Promise<void>;
}

export interface ChallengeResponder {
    respondUnauthorised(resource: Resource, response: DeniedResponse, request: DeniedRequest): Promise<void>;
}

export interface ResponseClassifier {
    canLogin(resource: Resource, request: DeniedRequest): boolean;
    isAjax(resource: Resource, request: DeniedRequest): boolean;
}

export interface LoginResponseConfig {
    enabled: boolean;
    loginPage: string;
    excludePaths: readonly string[];
}

export interface LoginPayload {
    loginResult?: boolean;
    authReason: AuthReason;
    userUrl?: string;
}
