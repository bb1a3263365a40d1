import { Credentials } from './types';

export interface SendOptions {
    timeoutMs?: number;
}

/**
 * Line-oriented interactive CLI. `send` writes one command and resolves with
 * everything the device printed before the next prompt, echo and prompt
 * stripped. Calls must not overlap: there is no framing between responses.
 */
export interface CliTransport {
    readonly host: string;
    readonly isOpen: boolean;
    open(): Promise<void>;
    send(command: string, options?: SendOptions): Promise<string>;
    close(): Promise<void>;
}

export interface TransportTarget {
    host: string;
    port: number;
    credentials: Credentials;
}

export type TransportFactory = (target: TransportTarget) => CliTransport;
