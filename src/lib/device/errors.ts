import { SessionState } from './types';

export class DeviceError extends Error {
    constructor(message: string, readonly host: string) {
        super(message);
        this.name = 'DeviceError';
    }
}

export class DeviceAuthenticationError extends DeviceError {
    constructor(host: string, username: string) {
        super(`Authentication failed for ${username}@${host}`, host);
        this.name = 'DeviceAuthenticationError';
    }
}

export class DeviceTimeoutError extends DeviceError {
    constructor(host: string, what: string, readonly timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms waiting for ${what} on ${host}`, host);
        this.name = 'DeviceTimeoutError';
    }
}

export class DeviceConnectionError extends DeviceError {
    constructor(host: string, reason: string) {
        super(`Error connecting to ${host}: ${reason}`, host);
        this.name = 'DeviceConnectionError';
    }
}

// Caller error: operation not allowed in the session's current state.
export class SessionStateError extends Error {
    constructor(operation: string, readonly state: SessionState, detail?: string) {
        super(`${operation} is not allowed in state '${state}'${detail ? `: ${detail}` : ''}`);
        this.name = 'SessionStateError';
    }
}
