import { buildProgram, CliOptions } from './cli';

function parse(args: string[]): CliOptions {
    const program = buildProgram()
        .exitOverride()
        .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    program.parse(args, { from: 'user' });
    return program.opts<CliOptions>();
}

describe('Command line', () => {
    test('Generates only by default', () => {
        const opts = parse([]);

        expect(opts.apply).toBeUndefined();
        expect(opts.commit).toBeUndefined();
        expect(opts.config).toBe('configs/prefix_policies.yaml');
        expect(opts.rollbackMinutes).toBe(3);
        expect(opts.outputDir).toBe('configs/generated');
        expect(opts.lookupBinary).toBe('bgpq4');
        expect(opts.port).toBeUndefined();
    });

    test('Takes "all" when --commit names no router', () => {
        expect(parse(['--commit']).commit).toBe('all');
        expect(parse(['--commit', '192.0.2.1']).commit).toBe('192.0.2.1');
        expect(parse(['--rollback']).rollback).toBe('all');
    });

    test('Parses numeric options', () => {
        const opts = parse(['--apply', '--rollback-minutes', '10', '--port', '2222']);

        expect(opts.apply).toBe(true);
        expect(opts.rollbackMinutes).toBe(10);
        expect(opts.port).toBe(2222);
    });

    test('Rejects a non-numeric rollback window', () => {
        expect(() => parse(['--rollback-minutes', 'soon'])).toThrow(/Not an integer/);
    });

    test('Refuses to apply and commit in one run', () => {
        expect(() => parse(['--apply', '--commit'])).toThrow(/cannot be used with/);
    });
});
