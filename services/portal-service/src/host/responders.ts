import {
    ByteRange,
    ChallengeResponder,
    ContentResource,
    ContentResponder,
    DeniedRequest,
    DeniedResponse,
    Resource
} from '@loginwall/login-response';

/**
 * Streams a page with its own status (200). Used for the login page, so a
 * denied request never carries 401 to the browser.
 */
export class PageContentResponder implements ContentResponder {
    async respondContent(resource: ContentResource, response: DeniedResponse, request: DeniedRequest, range: ByteRange | null): Promise<void> {
        response.setStatus(200);
        response.setCacheControlNoCacheHeader();
        const contentType = resource.getContentType(request.acceptHeader || 'text/html');
        if (contentType) {
            response.setContentTypeHeader(contentType);
        }
        await resource.sendContent(response.getOutputStream(), range, request.attributes);
    }
}

export class BasicChallengeResponder implements ChallengeResponder {
    constructor(private readonly realm: string) { }

    async respondUnauthorised(_resource: Resource, response: DeniedResponse, _request: DeniedRequest): Promise<void> {
        response.setStatus(401);
        response.setAuthenticateHeader(`Basic realm="${this.realm}"`);
        response.setContentLengthHeader(0);
    }
}
