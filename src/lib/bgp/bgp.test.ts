import { compile, isComment, policyComment } from './compiler';
import { isQualifier, lookupLabel, parseRouteFilters } from './parsers';
import { LookupResult } from './types';

const sampleJunosOutput = `
policy-options {
replace:
 policy-statement AS-EXAMPLE/route-set1 {
  term AS-EXAMPLE/route-set1 {
   from {
    protocol bgp;
    route-filter 192.0.2.0/24 exact;
    route-filter 198.51.100.0/22 upto /24;
    route-filter 203.0.113.0/24 prefix-length-range /25-/27;
   }
   then next policy;
  }
 }
}
`;

const result = (entries: LookupResult['entries']): LookupResult => ({
    policyName: 'TEST',
    asSet: 'AS-TEST',
    entries,
});

describe('bgpq4 output parsing', () => {
    test('Extracts route-filter entries in tool order', () => {
        const entries = parseRouteFilters(sampleJunosOutput);

        expect(entries).toEqual([
            { prefix: '192.0.2.0/24', qualifier: 'exact' },
            { prefix: '198.51.100.0/22', qualifier: 'upto /24' },
            { prefix: '203.0.113.0/24', qualifier: 'prefix-length-range /25-/27' },
        ]);
    });

    test('Handles several entries on one line', () => {
        const entries = parseRouteFilters('route-filter 192.0.2.0/24 exact; route-filter 198.51.100.0/24 exact;');

        expect(entries.map(e => e.prefix)).toEqual(['192.0.2.0/24', '198.51.100.0/24']);
    });

    test('Ignores qualifiers it does not know', () => {
        // only exact, upto and prefix-length-range are extracted
        const entries = parseRouteFilters('route-filter 192.0.2.0/24 exact;\nroute-filter 203.0.113.0/24 orlonger;');

        expect(entries).toEqual([{ prefix: '192.0.2.0/24', qualifier: 'exact' }]);
    });

    test('Returns nothing for text without route filters', () => {
        expect(parseRouteFilters('prefix-set "TEST" {\n  192.0.2.0/24\n}')).toEqual([]);
    });

    test('Recognises qualifier syntax', () => {
        expect(isQualifier('exact')).toBe(true);
        expect(isQualifier('upto /24')).toBe(true);
        expect(isQualifier('prefix-length-range /25-/27')).toBe(true);
        expect(isQualifier('orlonger')).toBe(false);
        expect(isQualifier('upto 24')).toBe(false);
    });

    test('Adds the default route-set suffix only to plain policy names', () => {
        expect(lookupLabel('TEST-ROUTES')).toBe('TEST-ROUTES/route-set1');
        expect(lookupLabel('AS-EXAMPLE:Route-Set-Customers')).toBe('AS-EXAMPLE:Route-Set-Customers');
        expect(lookupLabel('customers-as-set')).toBe('customers-as-set');
    });
});

describe('Policy compiler', () => {
    test('Compiles entries between the protocol and trailer terms', () => {
        const statements = compile(result([
            { prefix: '192.0.2.0/24', qualifier: 'exact' },
            { prefix: '203.0.113.0/24', qualifier: 'upto /24' },
        ]), 'TEST');

        expect(statements).toEqual([
            'set policy-options policy-statement TEST term route-set1 from protocol bgp',
            'set policy-options policy-statement TEST term route-set1 from route-filter 192.0.2.0/24 exact',
            'set policy-options policy-statement TEST term route-set1 from route-filter 203.0.113.0/24 upto /24',
            'set policy-options policy-statement TEST term route-set1 then next policy',
            'set policy-options policy-statement TEST term reject then reject',
        ]);
    });

    test('Emits one line per entry plus three fixed lines', () => {
        const entries = parseRouteFilters(sampleJunosOutput);
        const statements = compile(result(entries), 'AS-EXAMPLE') ?? [];

        expect(statements).toHaveLength(entries.length + 3);
        expect(statements[0]).toMatch(/from protocol bgp$/);
        expect(statements[statements.length - 2]).toMatch(/then next policy$/);
        expect(statements[statements.length - 1]).toMatch(/term reject then reject$/);
    });

    test('Returns null instead of an empty policy', () => {
        expect(compile(result([]), 'TEST')).toBeNull();
        expect(compile(null, 'TEST')).toBeNull();
        expect(compile(undefined, 'TEST')).toBeNull();
    });

    test('Is deterministic', () => {
        const input = result(parseRouteFilters(sampleJunosOutput));

        expect(compile(input, 'TEST')?.join('\n')).toBe(compile(input, 'TEST')?.join('\n'));
    });

    test('Marks policy comments as inert', () => {
        const comment = policyComment('TEST-ROUTES', 'AS65530');

        expect(comment).toBe('# BGP Prefix List for TEST-ROUTES (AS65530)');
        expect(isComment(comment)).toBe(true);
        expect(isComment('set policy-options policy-statement TEST term reject then reject')).toBe(false);
    });
});
