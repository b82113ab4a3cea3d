import Ajv, { JSONSchemaType } from 'ajv';
import { DEFAULT_LOGIN_PAGE } from '@loginwall/constants';
import { LoginResponseConfig } from './types';
import { LoginConfigError } from './errors';

export interface LoginResponseConfigInput {
    enabled?: boolean;
    loginPage?: string;
    excludePaths?: string[];
}

interface ConfigDocument {
    enabled: boolean;
    loginPage: string;
    excludePaths: string[];
}

const ajv = new Ajv({ allErrors: true });

const configSchema: JSONSchemaType<ConfigDocument> = {
    type: 'object',
    properties: {
        enabled: { type: 'boolean' },
        loginPage: { type: 'string', pattern: '^/' },
        excludePaths: { type: 'array', items: { type: 'string', minLength: 1 } }
    },
    required: ['enabled', 'loginPage', 'excludePaths'],
    additionalProperties: false
};

const validateConfig = ajv.compile(configSchema);

export const DEFAULT_LOGIN_RESPONSE_CONFIG: LoginResponseConfig = Object.freeze({
    enabled: true,
    loginPage: DEFAULT_LOGIN_PAGE,
    excludePaths: Object.freeze([])
});

/**
 * Merge the given settings over the defaults and validate the result.
 * The returned config (and its exclusion list) is frozen.
 */
export const resolveLoginResponseConfig = (input: LoginResponseConfigInput = {}): LoginResponseConfig => {
    const merged: ConfigDocument = {
        enabled: input.enabled ?? DEFAULT_LOGIN_RESPONSE_CONFIG.enabled,
        loginPage: input.loginPage ?? DEFAULT_LOGIN_RESPONSE_CONFIG.loginPage,
        excludePaths: [...(input.excludePaths ?? DEFAULT_LOGIN_RESPONSE_CONFIG.excludePaths)]
    };

    if (!validateConfig(merged)) {
        const details = (validateConfig.errors || []).map(e => `${e.instancePath || '/'} ${e.message}`);
        throw new LoginConfigError(details);
    }

    return Object.freeze({
        enabled: merged.enabled,
        loginPage: merged.loginPage,
        excludePaths: Object.freeze(merged.excludePaths)
    });
};
