import { PrefixEntry, Qualifier } from './types';

// bgpq4 -J output, e.g.
//   route-filter 192.0.2.0/24 exact;
//   route-filter 198.51.100.0/22 upto /24;
//   route-filter 203.0.113.0/24 prefix-length-range /25-/27;
// Several entries may share one line, so match over the whole text.
const ROUTE_FILTER = /route-filter\s+(\S+)\s+(exact|upto \/\d+|prefix-length-range \/\d+-\/\d+);/g;

export function isQualifier(value: string): value is Qualifier {
    return value === 'exact'
        || /^upto \/\d+$/.test(value)
        || /^prefix-length-range \/\d+-\/\d+$/.test(value);
}

export function parseRouteFilters(input: string): PrefixEntry[] {
    const entries: PrefixEntry[] = [];

    for (const match of input.matchAll(ROUTE_FILTER)) {
        const [, prefix, qualifier] = match;
        if (!isQualifier(qualifier)) continue;
        entries.push({ prefix, qualifier });
    }

    return entries;
}

// Label handed to bgpq4 -l. Plain policy names get the default route-set suffix.
export function lookupLabel(policyName: string): string {
    const lower = policyName.toLowerCase();
    if (lower.includes('route-set') || lower.includes('as-set')) return policyName;
    return `${policyName}/route-set1`;
}
