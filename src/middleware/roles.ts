import { UserRole } from '../types';

export const CAPABILITIES = [
    'applications:submit',
    'applications:read',
    'applications:review',
    'audit:read',
    'weights:manage',
    'model:manage',
    'users:manage',
] as const;

export type Capability = typeof CAPABILITIES[number];

const ROLE_CAPABILITIES: Record<UserRole, ReadonlySet<Capability>> = {
    superadmin: new Set(CAPABILITIES),
    bank_manager: new Set<Capability>([
        'applications:submit',
        'applications:read',
        'applications:review',
        'audit:read',
        'weights:manage',
        'model:manage',
    ]),
    loan_officer: new Set<Capability>(['applications:submit', 'applications:read']),
};

export function hasCapability(role: UserRole, capability: Capability): boolean {
    return ROLE_CAPABILITIES[role].has(capability);
}

export function capabilitiesOf(role: UserRole): Capability[] {
    return CAPABILITIES.filter(c => ROLE_CAPABILITIES[role].has(c));
}
