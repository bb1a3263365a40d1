import { CredentialResolver, CredentialsError, Prompt } from './credentials';

function recordingPrompt(answers: Record<string, string>): Prompt & { questions: string[] } {
    const questions: string[] = [];
    const prompt: Prompt = async (question) => {
        questions.push(question);
        return answers[question] ?? '';
    };
    return Object.assign(prompt, { questions });
}

describe('Credential resolver', () => {
    test('Prefers the configuration document over flags and environment', async () => {
        const resolver = new CredentialResolver({
            flags: { username: 'flag-user', password: 'flag-secret' },
            env: { USERNAME: 'env-user', PASSWORD: 'env-secret' },
        });

        expect(await resolver.resolve('192.0.2.1', { username: 'netops', password: 'test-secret' }))
            .toEqual({ username: 'netops', password: 'test-secret' });
    });

    test('Takes flags before the environment, field by field', async () => {
        const resolver = new CredentialResolver({
            flags: { username: 'flag-user' },
            env: { USERNAME: 'env-user', PASSWORD: 'env-secret' },
        });

        expect(await resolver.resolve('192.0.2.1')).toEqual({ username: 'flag-user', password: 'env-secret' });
    });

    test('Prompts once and reuses the answers', async () => {
        const prompt = recordingPrompt({
            'Enter username for 192.0.2.1: ': ' netops ',
            'Enter password for netops@192.0.2.1: ': 'test-secret',
        });
        const resolver = new CredentialResolver({ env: {}, prompt });

        const first = await resolver.resolve('192.0.2.1');
        const second = await resolver.resolve('192.0.2.2');

        expect(first).toEqual({ username: 'netops', password: 'test-secret' });
        expect(second).toEqual(first);
        expect(prompt.questions).toEqual(['Enter username for 192.0.2.1: ', 'Enter password for netops@192.0.2.1: ']);
    });

    test('Fails without a terminal to prompt on', async () => {
        const resolver = new CredentialResolver({ flags: { username: 'netops' }, env: {} });

        await expect(resolver.resolve('192.0.2.1')).rejects.toThrow(CredentialsError);
        await expect(resolver.resolve('192.0.2.1'))
            .rejects.toThrow('No password for netops@192.0.2.1 configured and no terminal to prompt on');
    });

    test('Rejects an empty prompted answer', async () => {
        const resolver = new CredentialResolver({ env: {}, prompt: recordingPrompt({}) });

        await expect(resolver.resolve('192.0.2.1')).rejects.toThrow('No username given for 192.0.2.1');
    });

    test('Reuses a prompted password only for the same username', async () => {
        const prompt = recordingPrompt({
            'Enter password for netops@192.0.2.1: ': 'test-secret',
            'Enter password for backup@192.0.2.2: ': 'backup-secret',
        });
        const resolver = new CredentialResolver({ env: {}, prompt });

        const first = await resolver.resolve('192.0.2.1', { username: 'netops' });
        const second = await resolver.resolve('192.0.2.2', { username: 'backup' });
        const third = await resolver.resolve('192.0.2.3', { username: 'netops' });

        expect(first).toEqual({ username: 'netops', password: 'test-secret' });
        expect(second).toEqual({ username: 'backup', password: 'backup-secret' });
        expect(third).toEqual({ username: 'netops', password: 'test-secret' });
        expect(prompt.questions).toEqual(['Enter password for netops@192.0.2.1: ', 'Enter password for backup@192.0.2.2: ']);
    });
});
