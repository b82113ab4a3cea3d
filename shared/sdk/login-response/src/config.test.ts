import { LoginConfigError } from './errors';
import { resolveLoginResponseConfig } from './config';

describe('resolveLoginResponseConfig', () => {
    it('should apply defaults', () => {
        expect(resolveLoginResponseConfig()).toEqual({
            enabled: true,
            loginPage: '/login.html',
            excludePaths: []
        });
    });

    it('should keep provided values', () => {
        const config = resolveLoginResponseConfig({ enabled: false, loginPage: '/signin', excludePaths: ['/dav', '/api/'] });

        expect(config.enabled).toBe(false);
        expect(config.loginPage).toBe('/signin');
        expect(config.excludePaths).toEqual(['/dav', '/api/']);
    });

    it('should freeze the result', () => {
        const input = { excludePaths: ['/dav'] };
        const config = resolveLoginResponseConfig(input);
        input.excludePaths.push('/later');

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.excludePaths)).toBe(true);
        expect(config.excludePaths).toEqual(['/dav']);
    });

    it('should reject a relative login page', () => {
        expect(() => resolveLoginResponseConfig({ loginPage: 'login.html' })).toThrow(LoginConfigError);
        try {
            resolveLoginResponseConfig({ loginPage: 'login.html' });
        } catch (error) {
            expect(error).toBeInstanceOf(LoginConfigError);
            if (error instanceof LoginConfigError) {
                expect(error.details).toEqual(['/loginPage must match pattern "^/"']);
            }
        }
    });

    it('should reject an empty exclusion prefix', () => {
        expect(() => resolveLoginResponseConfig({ excludePaths: ['/dav', ''] }))
            .toThrow('Invalid login response config: /excludePaths/1 must NOT have fewer than 1 characters');
    });
});
