import * as winston from 'winston';
import { ContentTypeClassifier } from './classifier';
import { ContentResource, DeniedRequest } from './types';

const silentLogger = winston.createLogger({ silent: true });

function contentResource(contentType?: string): ContentResource {
    return {
        name: 'report',
        getContentType: () => contentType,
        sendContent: jest.fn().mockResolvedValue(undefined)
    };
}

function mockRequest(acceptHeader?: string): DeniedRequest {
    return {
        method: 'GET',
        absolutePath: '/app/report',
        acceptHeader,
        hostHeader: 'portal.test',
        attributes: {}
    };
}

describe('ContentTypeClassifier', () => {
    const classifier = new ContentTypeClassifier(silentLogger);

    describe('canLogin', () => {
        it('should accept a resource declaring text/html', () => {
            expect(classifier.canLogin(contentResource('text/html'), mockRequest())).toBe(true);
        });

        it('should refuse a resource declaring application/octet-stream', () => {
            expect(classifier.canLogin(contentResource('application/octet-stream'), mockRequest('text/html'))).toBe(false);
        });

        it('should use the accept header when the resource declares no type', () => {
            expect(classifier.canLogin(contentResource(), mockRequest('text/html,*/*'))).toBe(true);
            expect(classifier.canLogin(contentResource(), mockRequest('image/png'))).toBe(false);
        });

        it('should refuse when neither the resource nor the request name a type', () => {
            expect(classifier.canLogin(contentResource(), mockRequest())).toBe(false);
        });

        it('should treat an empty declared type as declared', () => {
            expect(classifier.canLogin(contentResource(''), mockRequest('text/html'))).toBe(false);
        });

        it('should refuse a resource that produces no content', () => {
            expect(classifier.canLogin({ name: 'folder' }, mockRequest('text/html'))).toBe(false);
        });

        it('should pass text/html as the preferred type', () => {
            const resource = contentResource('text/html');
            const getContentType = jest.spyOn(resource, 'getContentType');

            classifier.canLogin(resource, mockRequest());

            expect(getContentType).toHaveBeenCalledWith('text/html');
        });
    });

    describe('isAjax', () => {
        it('should detect JSON clients', () => {
            expect(classifier.isAjax(contentResource(), mockRequest('application/json'))).toBe(true);
        });

        it('should detect script clients', () => {
            expect(classifier.isAjax(contentResource(), mockRequest('text/javascript, */*; q=0.01'))).toBe(true);
        });

        it('should not treat browsers as ajax', () => {
            expect(classifier.isAjax(contentResource(), mockRequest('text/html'))).toBe(false);
        });

        it('should not treat a missing accept header as ajax', () => {
            expect(classifier.isAjax({ name: 'folder' }, mockRequest())).toBe(false);
        });
    });
});
