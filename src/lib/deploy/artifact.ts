import { format } from 'date-fns';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { PolicyBlock } from './types';

export interface ArtifactInput {
    hostname: string;
    address: string;
    generatedAt: Date;
    blocks: PolicyBlock[];
}

export type ArtifactWriter = (input: ArtifactInput) => Promise<string>;

export function artifactFileName(hostname: string, generatedAt: Date): string {
    return `${hostname}_${format(generatedAt, 'yyyyMMdd_HHmmss')}.conf`;
}

export function renderArtifact({ hostname, address, generatedAt, blocks }: ArtifactInput): string {
    let text = `# Generated: ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}\n`;
    text += `# Router: ${hostname} (${address})\n\n`;

    for (const block of blocks) {
        text += block.statements.join('\n') + '\n\n';
    }
    return text;
}

// One file per router per run; the timestamp keeps runs apart.
export function createArtifactWriter(outputDir: string): ArtifactWriter {
    return async (input) => {
        await mkdir(outputDir, { recursive: true });
        const file = path.join(outputDir, artifactFileName(input.hostname, input.generatedAt));
        await writeFile(file, renderArtifact(input), 'utf8');
        return file;
    };
}
