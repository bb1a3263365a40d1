export interface Credentials {
    username: string;
    password: string;
}

export interface CredentialsRef {
    username?: string;
    password?: string;
}

export interface RouterTarget {
    hostname: string;
    address: string;
    port: number;
    credentials: CredentialsRef;
}

export type SessionState =
    | 'disconnected'
    | 'connected'
    | 'config-mode'
    | 'awaiting-confirmation' // commit confirmed issued, device timer running
    | 'confirmed'
    | 'rolled-back'
    | 'failed';

export interface ApplyResult {
    success: boolean;
    output: string;
    manualCommitRequired: boolean;
    failedCommand?: string;
}

export interface CommitResult {
    success: boolean;
    output: string;
}
