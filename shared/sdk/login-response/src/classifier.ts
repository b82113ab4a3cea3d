import { logger as defaultLogger, Logger } from '@loginwall/service-template';
import { DeniedRequest, Resource, ResponseClassifier, isContentResource } from './types';

const AJAX_TYPES = ['application/json', 'text/javascript'];

/**
 * Default classifier. Browser navigation wants HTML, scripted clients want
 * JSON, anything else gets the plain challenge. No User-Agent sniffing.
 */
export class ContentTypeClassifier implements ResponseClassifier {
    constructor(private readonly logger: Logger = defaultLogger) { }

    canLogin(resource: Resource, request: DeniedRequest): boolean {
        if (!isContentResource(resource)) {
            this.logger.debug('canLogin: resource does not produce content', { resource: resource.name });
            return false;
        }

        const declared = resource.getContentType('text/html');
        if (declared !== undefined) {
            const isPage = declared.includes('html');
            this.logger.debug(`canLogin: resource declares ${declared}, is html? ${isPage}`, { resource: resource.name });
            return isPage;
        }

        if (request.acceptHeader) {
            const isPage = request.acceptHeader.includes('html');
            this.logger.debug(`canLogin: no declared type, accept header wants html? ${isPage}`, { resource: resource.name });
            return isPage;
        }

        this.logger.debug('canLogin: no declared type and no accept header', { resource: resource.name });
        return false;
    }

    isAjax(resource: Resource, request: DeniedRequest): boolean {
        const accept = request.acceptHeader;
        return !!accept && AJAX_TYPES.some(type => accept.includes(type));
    }
}
