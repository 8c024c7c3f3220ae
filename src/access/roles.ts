import { PracticeLogConfig, RegistryConfig } from '../models/RoleConfig';

type Owned = Pick<RegistryConfig | PracticeLogConfig, 'owner'>;

export function isOwner(roles: Owned, caller: string): boolean {
    return roles.owner === caller;
}

export function isVerifier(roles: Pick<RegistryConfig, 'verifier'>, caller: string): boolean {
    return roles.verifier === caller;
}

export function isModerator(roles: Pick<PracticeLogConfig, 'moderator'>, caller: string): boolean {
    return roles.moderator === caller;
}

// A principal must be a non-blank identity string.
export function isIdentity(candidate: string): boolean {
    return candidate.trim().length > 0;
}
