import { LookupResult } from './types';

export const ROUTE_SET_TERM = 'route-set1';
export const REJECT_TERM = 'reject';

/**
 * Turns a lookup result into Junos `set` statements for one policy-statement.
 *
 * Order is fixed: protocol match, one route-filter per entry (tool order),
 * accept-and-continue, then the default reject term. Returns null when there
 * is nothing to filter on; callers treat that as a failed policy.
 */
export function compile(result: LookupResult | null | undefined, policyName: string): string[] | null {
    if (!result || result.entries.length === 0) {
        return null;
    }

    const base = `set policy-options policy-statement ${policyName}`;
    const term = `${base} term ${ROUTE_SET_TERM}`;

    const statements: string[] = [`${term} from protocol bgp`];

    for (const entry of result.entries) {
        // 'exact' and length-bound qualifiers are both rendered as extracted
        statements.push(`${term} from route-filter ${entry.prefix} ${entry.qualifier}`);
    }

    statements.push(`${term} then next policy`);
    statements.push(`${base} term ${REJECT_TERM} then reject`);

    return statements;
}

export function isComment(statement: string): boolean {
    return statement.trim().startsWith('#');
}

export function policyComment(policyName: string, asSet: string): string {
    return `# BGP Prefix List for ${policyName} (${asSet})`;
}
