import { AuthReason, AUTH_REASONS } from '@loginwall/constants';
import { DeniedRequest } from './types';

// An authorization tag means credentials were presented and still refused.
export const resolveAuthReason = (request: DeniedRequest): AuthReason => {
    const tag = request.authorization?.tag;
    return tag ? AUTH_REASONS.NOT_PERMITTED : AUTH_REASONS.REQUIRED;
};
