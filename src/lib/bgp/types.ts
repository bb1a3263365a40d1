export type Registry = string; // bgpq4 -S source list, e.g. 'RIPE' or 'RIPE,RADB'

export type Qualifier =
    | 'exact'
    | `upto /${number}`
    | `prefix-length-range /${number}-/${number}`;

export interface PrefixEntry {
    prefix: string; // "192.0.2.0/24"
    qualifier: Qualifier;
}

export interface PolicySpec {
    name: string;
    asSet: string;
    registry: Registry;
    maxLength: number;
}

export interface LookupRequest {
    policyName: string;
    asSet: string;
    registry: Registry;
    maxLength: number;
}

export interface LookupResult {
    policyName: string;
    asSet: string;
    entries: PrefixEntry[]; // Order as emitted by the lookup tool
}

export type LookupFailure =
    | { kind: 'exit'; exitCode: number; stderr: string }
    | { kind: 'empty-output' };

export type LookupOutcome =
    | { ok: true; result: LookupResult }
    | { ok: false; failure: LookupFailure };

export type LookupFn = (request: LookupRequest) => Promise<LookupOutcome>;
