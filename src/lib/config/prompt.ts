import { createInterface } from 'readline/promises';
import { Writable } from 'stream';
import { Prompt } from './credentials';

// Reads one line from the terminal; secret answers are not echoed.
export const terminalPrompt: Prompt = async (question, { secret }) => {
    let muted = false;
    const output = new Writable({
        write(chunk, _encoding, callback) {
            if (!muted) process.stdout.write(chunk);
            callback();
        },
    });

    const rl = createInterface({ input: process.stdin, output, terminal: true });
    try {
        const answer = rl.question(question);
        muted = secret;
        return await answer;
    } finally {
        rl.close();
        if (secret) process.stdout.write('\n');
    }
};

export function interactivePrompt(): Prompt | undefined {
    return process.stdin.isTTY ? terminalPrompt : undefined;
}
