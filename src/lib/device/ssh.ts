import { Client, ClientChannel } from 'ssh2';
import { DeviceAuthenticationError, DeviceConnectionError, DeviceTimeoutError } from './errors';
import { CliTransport, SendOptions, TransportTarget } from './transport';

export const CONNECT_TIMEOUT_MS = 30_000;
export const COMMAND_TIMEOUT_MS = 30_000;

// user@router> / user@router# / root@router:RE:0%
export const JUNOS_PROMPT = /(?:^|\n)[\w.\-]+@[\w.\-:]+[>#%] ?$/;

const SHELL_PROMPT = /% ?$/;

export interface SshTransportOptions {
    connectTimeoutMs?: number;
    commandTimeoutMs?: number;
    prompt?: RegExp;
}

interface PendingRead {
    check: () => void;
    fail: (error: Error) => void;
}

/**
 * Drops the command echo, the trailing prompt and the `[edit]` banner Junos
 * prints before it. Everything in between is returned verbatim.
 */
export function normalizeOutput(raw: string, command: string, prompt: RegExp = JUNOS_PROMPT): string {
    const lines = raw.replace(/\r/g, '').split('\n');

    if (command && lines.length > 0 && lines[0].trimEnd().endsWith(command)) {
        lines.shift();
    }

    if (lines.length > 0 && prompt.test(lines[lines.length - 1])) {
        lines.pop();
    }
    if (lines.length > 0 && /^\[edit.*\]$/.test(lines[lines.length - 1].trim())) {
        lines.pop();
    }

    return lines.join('\n').trim();
}

export class SshTransport implements CliTransport {
    private client: Client | null = null;
    private channel: ClientChannel | null = null;
    private buffer = '';
    private pending: PendingRead | null = null;

    private readonly connectTimeoutMs: number;
    private readonly commandTimeoutMs: number;
    private readonly prompt: RegExp;

    constructor(private readonly target: TransportTarget, options: SshTransportOptions = {}) {
        this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
        this.commandTimeoutMs = options.commandTimeoutMs ?? COMMAND_TIMEOUT_MS;
        this.prompt = options.prompt ?? JUNOS_PROMPT;
    }

    get host(): string {
        return this.target.host;
    }

    get isOpen(): boolean {
        return this.channel !== null;
    }

    async open(): Promise<void> {
        const { host, port, credentials } = this.target;
        const client = new Client();

        await new Promise<void>((resolve, reject) => {
            client.once('ready', () => resolve());
            client.once('error', (err) => {
                if (err.level === 'client-authentication') {
                    reject(new DeviceAuthenticationError(host, credentials.username));
                } else if (err.level === 'client-timeout') {
                    reject(new DeviceTimeoutError(host, 'SSH handshake', this.connectTimeoutMs));
                } else {
                    reject(new DeviceConnectionError(host, err.message));
                }
            });
            // Junos often offers keyboard-interactive instead of plain password auth
            client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
                finish(prompts.map(() => credentials.password));
            });
            client.connect({
                host,
                port,
                username: credentials.username,
                password: credentials.password,
                tryKeyboard: true,
                readyTimeout: this.connectTimeoutMs,
            });
        }).catch((error: unknown) => {
            client.end();
            throw error;
        });

        client.on('error', (err) => {
            this.pending?.fail(new DeviceConnectionError(host, err.message));
        });

        const channel = await new Promise<ClientChannel>((resolve, reject) => {
            client.shell({ term: 'vt100', cols: 511, rows: 24 }, (err, stream) => {
                if (err) reject(new DeviceConnectionError(host, err.message));
                else resolve(stream);
            });
        }).catch((error: unknown) => {
            client.end();
            throw error;
        });

        channel.on('data', (chunk: Buffer) => {
            this.buffer += chunk.toString('utf8');
            this.pending?.check();
        });
        channel.on('close', () => {
            this.channel = null;
            this.pending?.fail(new DeviceConnectionError(host, 'channel closed by device'));
        });

        this.client = client;
        this.channel = channel;

        try {
            const banner = await this.readUntilPrompt(this.connectTimeoutMs, 'login prompt');
            // root logins land in the FreeBSD shell; the Junos CLI is one command away
            if (SHELL_PROMPT.test(banner)) {
                await this.send('cli');
            }
        } catch (error) {
            await this.close();
            throw error;
        }
    }

    async send(command: string, options: SendOptions = {}): Promise<string> {
        const channel = this.channel;
        if (!channel) {
            throw new DeviceConnectionError(this.host, 'transport is not open');
        }

        this.buffer = '';
        const reply = this.readUntilPrompt(options.timeoutMs ?? this.commandTimeoutMs, `response to '${command}'`);
        channel.write(`${command}\n`);

        return normalizeOutput(await reply, command, this.prompt);
    }

    async close(): Promise<void> {
        this.channel?.end();
        this.client?.end();
        this.channel = null;
        this.client = null;
    }

    private readUntilPrompt(timeoutMs: number, what: string): Promise<string> {
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending = null;
                reject(new DeviceTimeoutError(this.host, what, timeoutMs));
            }, timeoutMs);

            const settle = () => {
                clearTimeout(timer);
                this.pending = null;
            };

            this.pending = {
                check: () => {
                    if (!this.prompt.test(this.buffer)) return;
                    settle();
                    const raw = this.buffer;
                    this.buffer = '';
                    resolve(raw);
                },
                fail: (error) => {
                    settle();
                    reject(error);
                },
            };
            this.pending.check();
        });
    }
}

export function createSshTransport(options: SshTransportOptions = {}) {
    return (target: TransportTarget): CliTransport => new SshTransport(target, options);
}
