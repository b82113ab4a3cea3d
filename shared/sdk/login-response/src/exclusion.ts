import { DeniedRequest } from './types';

/**
 * Paths that never get a login page or payload, only the standard challenge.
 */
export class PathExclusionMatcher {
    private readonly prefixes: readonly string[];

    constructor(prefixes: readonly string[] = []) {
        this.prefixes = prefixes;
    }

    isExcluded(request: DeniedRequest): boolean {
        if (this.prefixes.length === 0) {
            return false;
        }
        return this.prefixes.some(prefix => request.absolutePath.startsWith(prefix));
    }
}
