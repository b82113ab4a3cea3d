import { DeniedRequest, DeniedResponse, LoginPayload } from './types';
import { resolveAuthReason } from './authReason';

// 400 rather than 401 so browsers never raise their own credential prompt
export const STRUCTURED_RESPONSE_STATUS = 400;

export const buildLoginPayload = (request: DeniedRequest): LoginPayload => {
    const { loginResult, userUrl } = request.attributes;
    return {
        ...(typeof loginResult === 'boolean' && { loginResult }),
        authReason: resolveAuthReason(request),
        ...(typeof userUrl === 'string' && { userUrl })
    };
};

/**
 * Write the login state as compact JSON for scripted clients.
 * Headers, including the exact byte length, are set before the single write.
 */
export const writeStructuredResponse = (request: DeniedRequest, response: DeniedResponse): LoginPayload => {
    const payload = buildLoginPayload(request);
    const body = Buffer.from(JSON.stringify(payload), 'utf8');

    response.setStatus(STRUCTURED_RESPONSE_STATUS);
    response.setCacheControlNoCacheHeader();
    response.setContentTypeHeader('application/json');
    response.setContentLengthHeader(body.length);
    response.getOutputStream().write(body);

    return payload;
};
