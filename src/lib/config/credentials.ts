import { Credentials, CredentialsRef } from '../device/types';

export class CredentialsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialsError';
    }
}

export type Prompt = (question: string, options: { secret: boolean }) => Promise<string>;

export interface CredentialSources {
    flags?: CredentialsRef;
    env?: NodeJS.ProcessEnv;
    prompt?: Prompt; // absent when stdin is not a terminal
}

function firstSet(...values: Array<string | undefined>): string | undefined {
    return values.find((v): v is string => v !== undefined && v !== '');
}

/**
 * Precedence: configuration document, command-line flags, USERNAME/PASSWORD
 * environment, interactive prompt. Prompted answers are reused for the rest
 * of the run, a prompted password only for the username it was typed for.
 * Nothing is ever written out.
 */
export class CredentialResolver {
    private promptedUsername: string | undefined;
    private readonly promptedPasswords = new Map<string, string>(); // by username

    constructor(private readonly sources: CredentialSources = {}) {}

    async resolve(address: string, fromConfig: CredentialsRef = {}): Promise<Credentials> {
        const flags: CredentialsRef = this.sources.flags ?? {};
        const env: NodeJS.ProcessEnv = this.sources.env ?? {};

        let username = firstSet(fromConfig.username, flags.username, env.USERNAME, this.promptedUsername);
        if (!username) {
            username = (await this.ask(`Enter username for ${address}: `, false, `username for ${address}`)).trim();
            if (!username) throw new CredentialsError(`No username given for ${address}`);
            this.promptedUsername = username;
        }

        let password = firstSet(fromConfig.password, flags.password, env.PASSWORD, this.promptedPasswords.get(username));
        if (!password) {
            password = await this.ask(`Enter password for ${username}@${address}: `, true, `password for ${username}@${address}`);
            if (!password) throw new CredentialsError(`No password given for ${username}@${address}`);
            this.promptedPasswords.set(username, password);
        }

        return { username, password };
    }

    private async ask(question: string, secret: boolean, what: string): Promise<string> {
        const prompt = this.sources.prompt;
        if (!prompt) {
            throw new CredentialsError(`No ${what} configured and no terminal to prompt on`);
        }
        return prompt(question, { secret });
    }
}
