import { DeviceAuthenticationError, DeviceConnectionError, DeviceTimeoutError } from './errors';
import { JUNOS_PROMPT, normalizeOutput, SshTransport } from './ssh';
import { FakeSshClient, ShellHandler, SshScript } from './testing';

vi.mock('ssh2', async () => {
    const testing = await import('./testing');
    return { Client: testing.FakeSshClient };
});

const target = { host: 'r1.example.net', port: 22, credentials: { username: 'netops', password: 'test-secret' } };

const LOGIN_BANNER = '--- JUNOS 23.4R1.9 Kernel 64-bit\r\nnetops@r1> ';

function script(banner: string, onCommand: ShellHandler = () => undefined, connectError?: SshScript['connectError']): void {
    FakeSshClient.script = { banner, onCommand, connectError };
}

function lastClient(): FakeSshClient {
    return FakeSshClient.instances[FakeSshClient.instances.length - 1];
}

describe('SSH output normalization', () => {
    test('Drops the echo and the trailing prompt', () => {
        const raw = 'show system uptime\r\nCurrent time: 2024-01-02 03:04:05 UTC\r\nnetops@r1> ';

        expect(normalizeOutput(raw, 'show system uptime')).toBe('Current time: 2024-01-02 03:04:05 UTC');
    });

    test('Drops the [edit] banner in configuration mode', () => {
        const raw = 'set policy-options policy-statement TEST term reject then reject\r\n\r\n[edit]\r\nnetops@r1# ';

        expect(normalizeOutput(raw, 'set policy-options policy-statement TEST term reject then reject')).toBe('');
    });

    test('Keeps error text the device printed', () => {
        const raw = 'sett foo\r\n          ^\r\nunknown command.\r\n\r\n[edit]\r\nnetops@r1# ';

        expect(normalizeOutput(raw, 'sett foo')).toBe('^\nunknown command.');
    });

    test('Recognises operational, configuration and shell prompts', () => {
        expect(JUNOS_PROMPT.test('netops@edge-1.example.net> ')).toBe(true);
        expect(JUNOS_PROMPT.test('netops@edge-1# ')).toBe(true);
        expect(JUNOS_PROMPT.test('root@edge-1:RE:0% ')).toBe(true);
        expect(JUNOS_PROMPT.test('commit complete')).toBe(false);
    });
});

describe('SSH transport', () => {
    test('Waits for a prompt that arrives in several chunks', async () => {
        script(LOGIN_BANNER, (channel, command) => {
            channel.receive(`${command}\r\nHostname: r1\r\nnetops@`);
            channel.receive('r1> ');
        });
        const transport = new SshTransport(target);

        await transport.open();

        expect(await transport.send('show version')).toBe('Hostname: r1');
        expect(await transport.send('show chassis hardware')).toBe('Hostname: r1');
        expect(lastClient().channel?.written).toEqual(['show version\n', 'show chassis hardware\n']);
        expect(lastClient().connectConfig).toMatchObject({ host: 'r1.example.net', port: 22, username: 'netops', tryKeyboard: true });
    });

    test('Times out when no prompt comes back', async () => {
        script(LOGIN_BANNER);
        const transport = new SshTransport(target, { commandTimeoutMs: 20 });
        await transport.open();

        const error = await transport.send('show chassis alarms').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DeviceTimeoutError);
        expect(error).toHaveProperty('message', "Timed out after 20ms waiting for response to 'show chassis alarms' on r1.example.net");
    });

    test('Fails a pending command when the channel closes', async () => {
        script(LOGIN_BANNER, (channel) => {
            channel.emit('close');
        });
        const transport = new SshTransport(target);
        await transport.open();

        const error = await transport.send('show log messages').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DeviceConnectionError);
        expect(error).toHaveProperty('message', 'Error connecting to r1.example.net: channel closed by device');
        expect(transport.isOpen).toBe(false);
    });

    test('Starts the Junos CLI when the login lands in a shell', async () => {
        script('root@r1:RE:0% ', (channel, command) => {
            if (command === 'cli') channel.receive('cli\r\nroot@r1> ');
        });
        const transport = new SshTransport(target);

        await transport.open();

        expect(transport.isOpen).toBe(true);
        expect(lastClient().channel?.written).toEqual(['cli\n']);
    });

    test('Reports rejected credentials and ends the client', async () => {
        script('', undefined, { level: 'client-authentication', message: 'All configured authentication methods failed' });

        await expect(new SshTransport(target).open()).rejects.toThrow(DeviceAuthenticationError);
        expect(lastClient().ended).toBe(true);
    });
});
