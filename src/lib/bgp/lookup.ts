import { execFile } from 'child_process';
import { Logger, silentLogger } from '../logging/logger';
import { lookupLabel, parseRouteFilters } from './parsers';
import { LookupFn, LookupOutcome, LookupRequest } from './types';

export const DEFAULT_LOOKUP_BINARY = 'bgpq4';

export class LookupToolMissingError extends Error {
    constructor(readonly binary: string) {
        super(`${binary} command not found. Please install ${binary}.`);
        this.name = 'LookupToolMissingError';
    }
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

// Resolves for any exit status; rejects only when the binary can't be started.
export const execFileRunner: CommandRunner = (file, args) =>
    new Promise((resolve, reject) => {
        execFile(file, args, { encoding: 'utf8', maxBuffer: 64 * 1024 * 1024 }, (error, stdout, stderr) => {
            if (!error) {
                resolve({ exitCode: 0, stdout, stderr });
                return;
            }
            if (error.code === 'ENOENT') {
                reject(new LookupToolMissingError(file));
                return;
            }
            if (typeof error.code === 'number') {
                resolve({ exitCode: error.code, stdout, stderr });
                return;
            }
            // Killed by a signal: no exit status to report
            resolve({ exitCode: -1, stdout, stderr: stderr || `${file} terminated by ${error.signal ?? 'signal'}` });
        });
    });

export function buildLookupArgs(request: LookupRequest): string[] {
    return [
        '-S', request.registry,
        '-A', // aggregate
        '-J', // Junos syntax
        '-E', // extended (policy-statement) output
        '-l', lookupLabel(request.policyName),
        request.asSet,
        '-R', String(request.maxLength),
        '-M', 'protocol bgp',
    ];
}

export interface LookupOptions {
    binary?: string;
    runner?: CommandRunner;
    logger?: Logger;
}

/**
 * One bgpq4 invocation per policy. A missing binary throws
 * LookupToolMissingError; every other failure comes back as a value.
 */
export function createLookup(options: LookupOptions = {}): LookupFn {
    const binary = options.binary ?? DEFAULT_LOOKUP_BINARY;
    const runner = options.runner ?? execFileRunner;
    const logger = options.logger ?? silentLogger;

    return async function lookup(request: LookupRequest): Promise<LookupOutcome> {
        const args = buildLookupArgs(request);
        logger.info(`Running command: ${[binary, ...args].join(' ')}`, { asSet: request.asSet });

        const { exitCode, stdout, stderr } = await runner(binary, args);

        if (exitCode !== 0) {
            logger.error(`${binary} command failed: ${stderr.trim()}`, { asSet: request.asSet, exitCode });
            return { ok: false, failure: { kind: 'exit', exitCode, stderr } };
        }

        if (stdout.trim() === '') {
            logger.error(`${binary} returned no output for ${request.asSet}`, { asSet: request.asSet });
            return { ok: false, failure: { kind: 'empty-output' } };
        }

        return {
            ok: true,
            result: {
                policyName: request.policyName,
                asSet: request.asSet,
                entries: parseRouteFilters(stdout),
            },
        };
    };
}
