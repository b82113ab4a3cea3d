import { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Writable } from 'stream';
import { logger } from '@loginwall/service-template';
import { LOGIN_ATTRIBUTES } from '@loginwall/constants';
import {
    BadRequestError,
    ByteRange,
    ContentResource,
    LoginAttributes,
    NotAuthorizedError,
    Resource,
    ResourceResolver
} from '@loginwall/login-response';

const CONTENT_TYPES: Record<string, string> = {
    '.html': 'text/html',
    '.htm': 'text/html',
    '.css': 'text/css',
    '.js': 'text/javascript',
    '.json': 'application/json',
    '.txt': 'text/plain',
    '.svg': 'image/svg+xml',
    '.png': 'image/png',
    '.ico': 'image/x-icon'
};

const PLACEHOLDER = new RegExp(`\\{\\{(${LOGIN_ATTRIBUTES.AUTH_REASON}|${LOGIN_ATTRIBUTES.USER_URL})\\}\\}`, 'g');

const escapeHtml = (value: string): string => value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export const renderPlaceholders = (html: string, attributes: LoginAttributes): string => {
    return html.replace(PLACEHOLDER, (_match, key: string) => {
        const value = attributes[key];
        return typeof value === 'string' ? escapeHtml(value) : '';
    });
};

export class FileResource implements ContentResource {
    constructor(readonly name: string, readonly filePath: string) { }

    getContentType(_preferred: string): string | undefined {
        return CONTENT_TYPES[path.extname(this.filePath).toLowerCase()];
    }

    async sendContent(out: Writable, range: ByteRange | null, attributes: LoginAttributes): Promise<void> {
        let content = await fs.readFile(this.filePath);
        if (this.getContentType('text/html') === 'text/html') {
            content = Buffer.from(renderPlaceholders(content.toString('utf8'), attributes), 'utf8');
        }
        if (range) {
            content = content.subarray(range.start, range.finish === undefined ? undefined : range.finish + 1);
        }
        out.write(content);
    }
}

// Directories resolve, but have no content of their own.
export class FolderResource implements Resource {
    constructor(readonly name: string, readonly dirPath: string) { }
}

/**
 * Stands in for a protected route while access to it is being denied.
 * Its content comes from the route handler, never from here.
 */
export class RouteResource implements ContentResource {
    constructor(readonly name: string, private readonly contentType?: string) { }

    getContentType(_preferred: string): string | undefined {
        return this.contentType;
    }

    async sendContent(): Promise<void> {
        throw new NotAuthorizedError(`Route ${this.name} is only rendered by its handler`, this.name);
    }
}

/**
 * Resolves logical paths to files under a pages directory. Every host shares
 * the same directory.
 */
export class FileResourceFactory implements ResourceResolver {
    private readonly root: string;

    constructor(root: string) {
        this.root = path.resolve(root);
    }

    async resolve(hostHeader: string, logicalPath: string): Promise<Resource | undefined> {
        const target = path.resolve(this.root, logicalPath.replace(/^\/+/, ''));
        if (target !== this.root && !target.startsWith(this.root + path.sep)) {
            throw new BadRequestError(`Path escapes the pages directory: ${logicalPath}`, logicalPath);
        }

        let stats: Stats;
        try {
            stats = await fs.stat(target);
        } catch (error) {
            const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
            if (code === 'ENOENT' || code === 'ENOTDIR') {
                logger.debug(`No page at ${hostHeader}${logicalPath}`);
                return undefined;
            }
            if (code === 'EACCES' || code === 'EPERM') {
                throw new NotAuthorizedError(`Cannot read ${logicalPath}`, logicalPath);
            }
            throw error;
        }

        const name = path.basename(target);
        return stats.isDirectory() ? new FolderResource(name, target) : new FileResource(name, target);
    }
}
