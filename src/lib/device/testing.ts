import { EventEmitter } from 'events';
import { CliTransport, SendOptions } from './transport';

export type Reply = string | Error;
export type Responder = (command: string) => Reply;

// Replies the way a Junos box does for the commands the session issues.
export function junosResponder(overrides: Record<string, Reply> = {}): Responder {
    return (command) => {
        if (command in overrides) return overrides[command];

        const confirmed = command.match(/^commit confirmed (\d+)$/);
        if (confirmed) {
            const minutes = confirmed[1];
            return [
                `configuration check succeeds`,
                `commit confirmed will be automatically rolled back in ${minutes} minutes unless confirmed`,
                `commit complete`,
                ``,
                `# commit confirmed will be rolled back in ${minutes} minutes`,
            ].join('\n');
        }
        if (command === 'commit') return 'commit complete';
        if (command === 'rollback 1') return 'load complete';
        return '';
    };
}

/**
 * In-process CliTransport: records every command and answers from a
 * responder instead of a device.
 */
export class ScriptedTransport implements CliTransport {
    isOpen = false;
    openError: Error | null = null;
    closeCount = 0;

    readonly sent: string[] = [];
    readonly timeouts: Array<number | undefined> = [];

    constructor(readonly host: string = 'r1.example.net', private readonly responder: Responder = junosResponder()) {}

    async open(): Promise<void> {
        if (this.openError) throw this.openError;
        this.isOpen = true;
    }

    async send(command: string, options: SendOptions = {}): Promise<string> {
        if (!this.isOpen) throw new Error('transport is not open');

        this.sent.push(command);
        this.timeouts.push(options.timeoutMs);

        const reply = this.responder(command);
        if (reply instanceof Error) throw reply;
        return reply;
    }

    async close(): Promise<void> {
        this.isOpen = false;
        this.closeCount += 1;
    }
}

export type ShellHandler = (channel: FakeShellChannel, command: string) => void;

export interface SshScript {
    banner: string;
    onCommand: ShellHandler;
    connectError?: { level: string; message: string };
}

export class FakeShellChannel extends EventEmitter {
    readonly written: string[] = [];
    ended = false;

    constructor(private readonly onCommand: ShellHandler) {
        super();
    }

    write(data: string): boolean {
        this.written.push(data);
        this.onCommand(this, data.replace(/\n$/, ''));
        return true;
    }

    end(): void {
        this.ended = true;
    }

    receive(text: string): void {
        this.emit('data', Buffer.from(text, 'utf8'));
    }
}

/**
 * Stands in for the ssh2 Client: answers connect() with 'ready' (or the
 * scripted error) and hands out a FakeShellChannel that prints the banner.
 */
export class FakeSshClient extends EventEmitter {
    static script: SshScript = { banner: '', onCommand: () => undefined };
    static readonly instances: FakeSshClient[] = [];

    channel: FakeShellChannel | null = null;
    connectConfig: Record<string, unknown> | null = null;
    ended = false;

    constructor() {
        super();
        FakeSshClient.instances.push(this);
    }

    connect(config: Record<string, unknown>): this {
        this.connectConfig = config;
        const { connectError } = FakeSshClient.script;
        queueMicrotask(() => {
            if (connectError) {
                this.emit('error', Object.assign(new Error(connectError.message), { level: connectError.level }));
            } else {
                this.emit('ready');
            }
        });
        return this;
    }

    shell(_options: Record<string, unknown>, callback: (err: Error | undefined, channel: FakeShellChannel) => void): this {
        const { banner, onCommand } = FakeSshClient.script;
        const channel = new FakeShellChannel(onCommand);
        this.channel = channel;
        callback(undefined, channel);
        setTimeout(() => channel.receive(banner), 0);
        return this;
    }

    end(): this {
        this.ended = true;
        return this;
    }
}
