import path from 'path';
import { LoginResponseConfigInput } from '@loginwall/login-response';

export interface PortalConfig {
    port: number;
    pagesDir: string;
    challengeRealm: string;
    accessTokens: string[];
    loginResponse: LoginResponseConfigInput;
}

function parseBooleanFlag(raw: string | undefined, defaultValue: boolean): boolean {
    if (typeof raw !== 'string') return defaultValue;
    const v = raw.trim().toLowerCase();
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
    return defaultValue;
}

function parseList(raw: string | undefined): string[] | undefined {
    if (typeof raw !== 'string') return undefined;
    return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export const loadPortalConfig = (env: NodeJS.ProcessEnv = process.env): PortalConfig => {
    const port = env.PORT ? parseInt(env.PORT, 10) : 3010;
    if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`Invalid PORT='${env.PORT}'`);
    }

    return {
        port,
        pagesDir: path.resolve(env.PAGES_DIR || path.join(__dirname, '..', 'pages')),
        challengeRealm: env.CHALLENGE_REALM || 'loginwall',
        accessTokens: parseList(env.ACCESS_TOKENS) ?? [],
        loginResponse: {
            enabled: parseBooleanFlag(env.LOGIN_RESPONSE_ENABLED, true),
            ...(env.LOGIN_PAGE ? { loginPage: env.LOGIN_PAGE } : {}),
            ...(env.LOGIN_EXCLUDE_PATHS !== undefined ? { excludePaths: parseList(env.LOGIN_EXCLUDE_PATHS) } : {})
        }
    };
};
