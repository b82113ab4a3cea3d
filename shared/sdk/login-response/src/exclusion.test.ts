import { PathExclusionMatcher } from './exclusion';
import { DeniedRequest } from './types';

function mockRequest(absolutePath: string): DeniedRequest {
    return { method: 'GET', absolutePath, hostHeader: 'portal.test', attributes: {} };
}

describe('PathExclusionMatcher', () => {
    it('should exclude nothing without prefixes', () => {
        expect(new PathExclusionMatcher().isExcluded(mockRequest('/dav/files'))).toBe(false);
        expect(new PathExclusionMatcher([]).isExcluded(mockRequest('/'))).toBe(false);
    });

    it('should match any configured prefix', () => {
        const matcher = new PathExclusionMatcher(['/api/', '/dav']);

        expect(matcher.isExcluded(mockRequest('/dav/files/a.txt'))).toBe(true);
        expect(matcher.isExcluded(mockRequest('/api/orders'))).toBe(true);
        expect(matcher.isExcluded(mockRequest('/app/dav'))).toBe(false);
    });

    it('should use plain prefix matching', () => {
        const matcher = new PathExclusionMatcher(['/dav']);
        expect(matcher.isExcluded(mockRequest('/davinci'))).toBe(true);
    });
});
