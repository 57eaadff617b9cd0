/**
 * Routing-ownership profiles used when reassigning numbers in the relational store.
 * Fixed table: there is no way to register another profile at runtime.
 */

export enum EnpTarget {
    NXP1 = 'NXP1',
    NXP2 = 'NXP2',
}

export interface EnpProfile {
    readonly systemId: number;
    readonly nprnId: number;
}

export const ENP_PROFILES: Readonly<Record<EnpTarget, EnpProfile>> = Object.freeze({
    [EnpTarget.NXP1]: Object.freeze({ systemId: 500, nprnId: 98067 }),
    [EnpTarget.NXP2]: Object.freeze({ systemId: 510, nprnId: 98019 }),
});

export const DEFAULT_ENP_TARGET = EnpTarget.NXP1;

export function isEnpTarget(value: unknown): value is EnpTarget {
    return value === EnpTarget.NXP1 || value === EnpTarget.NXP2;
}

export function profileFor(target: EnpTarget): EnpProfile {
    return ENP_PROFILES[target];
}
