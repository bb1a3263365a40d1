import { isComment } from '../bgp/compiler';
import { Logger, silentLogger } from '../logging/logger';
import { junosClassifier, ResponseClassifier } from './classifier';
import { DeviceError, SessionStateError } from './errors';
import { CliTransport, TransportFactory } from './transport';
import { ApplyResult, CommitResult, Credentials, RouterTarget, SessionState } from './types';

// A commit may sit for minutes while the device checks and activates the candidate.
export const COMMIT_TIMEOUT_MS = 400_000;

export const MIN_CONFIRM_MINUTES = 1;
export const MAX_CONFIRM_MINUTES = 65_535;

export const CLI_PREPARATION = ['set cli screen-length 0', 'set cli screen-width 511'];

export interface DeviceSessionOptions {
    classifier?: ResponseClassifier;
    logger?: Logger;
    commitTimeoutMs?: number;
}

/**
 * One interactive CLI session against one router, driving the
 * confirmed-commit protocol:
 *
 *   disconnected -> connected -> config-mode -> awaiting-confirmation
 *                                            -> confirmed | rolled-back | failed
 *
 * Commands are sent strictly one at a time. A session whose connect failed,
 * or which has left awaiting-confirmation, is never reused: permanent commit
 * and rollback happen from a fresh session.
 */
export class DeviceSession {
    private current: SessionState = 'disconnected';
    private spent = false;
    private transcript = '';

    private readonly classifier: ResponseClassifier;
    private readonly logger: Logger;
    private readonly commitTimeoutMs: number;

    constructor(private readonly transport: CliTransport, options: DeviceSessionOptions = {}) {
        this.classifier = options.classifier ?? junosClassifier;
        this.logger = options.logger ?? silentLogger;
        this.commitTimeoutMs = options.commitTimeoutMs ?? COMMIT_TIMEOUT_MS;
    }

    get host(): string {
        return this.transport.host;
    }

    get state(): SessionState {
        return this.current;
    }

    get output(): string {
        return this.transcript;
    }

    async connect(): Promise<void> {
        if (this.spent || this.current !== 'disconnected') {
            throw new SessionStateError('connect', this.current, this.spent ? 'session already used' : undefined);
        }
        this.spent = true;

        this.logger.info(`Connecting to ${this.host}...`);
        try {
            await this.transport.open();
            for (const command of CLI_PREPARATION) {
                await this.transport.send(command);
            }
        } catch (error) {
            await this.transport.close();
            this.logger.error(error instanceof Error ? error.message : `Error connecting to ${this.host}`);
            throw error;
        }

        this.current = 'connected';
        this.logger.info(`Successfully connected to ${this.host}`);
    }

    /**
     * Loads `statements` into the candidate configuration and activates it
     * with `commit confirmed <confirmMinutes>`. Stops at the first response
     * carrying an error marker; the partial candidate stays on the device
     * uncommitted. On success the device rolls back by itself unless a plain
     * `commit` arrives inside the window.
     */
    async applyWithConfirmedCommit(statements: string[], confirmMinutes: number): Promise<ApplyResult> {
        this.requireState('applyWithConfirmedCommit', ['connected']);

        if (!Number.isInteger(confirmMinutes) || confirmMinutes < MIN_CONFIRM_MINUTES || confirmMinutes > MAX_CONFIRM_MINUTES) {
            throw new RangeError(`confirm minutes must be an integer between ${MIN_CONFIRM_MINUTES} and ${MAX_CONFIRM_MINUTES}, got ${confirmMinutes}`);
        }

        const start = this.transcript.length;
        const sent = () => this.transcript.slice(start);

        try {
            this.logger.info('Entering configuration mode...');
            const entered = await this.enterConfigMode();
            if (!entered.ok) {
                return this.failApply('configure', entered.response, sent());
            }

            this.logger.info('Sending configuration commands...');
            for (const command of statements) {
                if (isComment(command)) continue;

                this.logger.debug(`Sending command: ${command}`);
                const response = await this.exchange(command);

                if (this.classifier.isError(response)) {
                    return this.failApply(command, response, sent());
                }
            }

            this.logger.info('Running commit confirmed...');
            const commitCommand = `commit confirmed ${confirmMinutes}`;
            const commitResponse = await this.exchange(commitCommand, this.commitTimeoutMs);
            if (this.classifier.isError(commitResponse)) {
                return this.failApply(commitCommand, commitResponse, sent());
            }

            await this.exchange('exit configuration-mode');
        } catch (error) {
            return this.failApply(null, describe(error), sent());
        }

        this.current = 'awaiting-confirmation';
        this.logger.warn(
            `Configuration applied to ${this.host} with commit confirmed ${confirmMinutes}. ` +
            `Run 'commit' within ${confirmMinutes} minutes or the device rolls back to its previous configuration.`,
            { host: this.host, confirmMinutes },
        );

        return { success: true, output: sent(), manualCommitRequired: true };
    }

    /**
     * Promotes the candidate (or a pending commit confirmed) to permanent.
     * Success requires the completion marker in the device response.
     */
    async commitPermanently(): Promise<CommitResult> {
        this.requireState('commitPermanently', ['connected', 'config-mode']);
        const start = this.transcript.length;

        try {
            await this.ensureConfigMode();

            this.logger.info('Committing configuration changes permanently...');
            const response = await this.exchange('commit', this.commitTimeoutMs);

            if (this.classifier.isComplete(response)) {
                this.current = 'confirmed';
                this.logger.info('Configuration committed successfully');
                return { success: true, output: this.transcript.slice(start) };
            }
            return this.failCommit(`Commit failed: ${response}`);
        } catch (error) {
            return this.failCommit(`Error committing changes: ${describe(error)}`);
        }
    }

    async rollbackOne(): Promise<CommitResult> {
        this.requireState('rollbackOne', ['connected', 'config-mode']);
        const start = this.transcript.length;

        try {
            await this.ensureConfigMode();

            this.logger.info('Rolling back to previous configuration...');
            const loaded = await this.exchange('rollback 1');
            // a rejected load leaves the candidate untouched
            if (this.classifier.isError(loaded)) {
                return this.failCommit(`Rollback failed: ${loaded}`);
            }

            const response = await this.exchange('commit', this.commitTimeoutMs);

            if (this.classifier.isComplete(response)) {
                this.current = 'rolled-back';
                this.logger.info('Successfully rolled back to previous configuration');
                return { success: true, output: this.transcript.slice(start) };
            }
            return this.failCommit(`Rollback failed: ${response}`);
        } catch (error) {
            return this.failCommit(`Error during rollback: ${describe(error)}`);
        }
    }

    /**
     * Closes the transport. Refused while awaiting confirmation: a session in
     * its rollback window is either kept open or explicitly detached.
     */
    async disconnect(): Promise<void> {
        if (this.current === 'awaiting-confirmation') {
            throw new SessionStateError('disconnect', this.current, 'use detach() to leave the rollback window running');
        }
        await this.closeTransport();
    }

    /**
     * Drops the transport of a session awaiting confirmation. Only the client
     * side goes away; the device's rollback timer is unaffected by it.
     */
    async detach(): Promise<void> {
        this.requireState('detach', ['awaiting-confirmation']);
        this.logger.warn(`Detaching from ${this.host}; pending commit confirmed is left to the device timer`, { host: this.host });
        await this.closeTransport();
    }

    private async closeTransport(): Promise<void> {
        if (!this.transport.isOpen) return;
        await this.transport.close();
        this.logger.info(`Disconnected from ${this.host}`);
    }

    private async enterConfigMode(): Promise<{ ok: boolean; response: string }> {
        const response = await this.exchange('configure');
        if (this.classifier.isError(response)) {
            return { ok: false, response };
        }
        this.current = 'config-mode';
        return { ok: true, response };
    }

    private async ensureConfigMode(): Promise<void> {
        if (this.current === 'config-mode') return;

        this.logger.info('Entering configuration mode...');
        const entered = await this.enterConfigMode();
        if (!entered.ok) {
            throw new DeviceError(`configure rejected: ${entered.response}`, this.host);
        }
    }

    private async exchange(command: string, timeoutMs?: number): Promise<string> {
        const response = await this.transport.send(command, timeoutMs === undefined ? {} : { timeoutMs });
        this.transcript += `${command}\n${response}\n`;
        return response;
    }

    private failApply(command: string | null, response: string, output: string): ApplyResult {
        this.current = 'failed';
        const message = command === null
            ? `Error during configuration: ${response}`
            : `Error executing command: ${command}\n${response}`;
        this.logger.error(message, { host: this.host });

        return {
            success: false,
            output: `${output}${message}`,
            manualCommitRequired: false,
            ...(command === null ? {} : { failedCommand: command }),
        };
    }

    private failCommit(message: string): CommitResult {
        this.current = 'failed';
        this.logger.error(message, { host: this.host });
        return { success: false, output: message };
    }

    private requireState(operation: string, allowed: SessionState[]): void {
        if (!allowed.includes(this.current)) {
            throw new SessionStateError(operation, this.current);
        }
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export type SessionFactory = (target: RouterTarget, credentials: Credentials) => DeviceSession;

export function createSessionFactory(transport: TransportFactory, options: DeviceSessionOptions = {}): SessionFactory {
    return (target, credentials) =>
        new DeviceSession(transport({ host: target.address, port: target.port, credentials }), options);
}
