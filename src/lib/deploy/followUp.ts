import { CredentialResolver } from '../config/credentials';
import { DeploymentConfig, DEFAULT_SSH_PORT } from '../config/loader';
import { DeviceSession, SessionFactory } from '../device/session';
import { CommitResult, RouterTarget } from '../device/types';
import { Logger, silentLogger } from '../logging/logger';
import { FollowUpAction, FollowUpOutcome, FollowUpSummary } from './types';

export const ALL_ROUTERS = 'all';

export interface FollowUpDeps {
    openSession: SessionFactory;
    credentials: CredentialResolver;
    logger?: Logger;
}

const VERB: Record<FollowUpAction, { doing: string; done: string }> = {
    commit: { doing: 'Committing changes on', done: 'committed changes on' },
    rollback: { doing: 'Rolling back', done: 'rolled back' },
};

function run(session: DeviceSession, action: FollowUpAction): Promise<CommitResult> {
    return action === 'commit' ? session.commitPermanently() : session.rollbackOne();
}

/**
 * Opens a fresh session to finish (or undo) an earlier confirmed commit.
 * The session is always closed afterwards.
 */
export async function followUp(target: RouterTarget, action: FollowUpAction, deps: FollowUpDeps): Promise<FollowUpOutcome> {
    const logger = deps.logger ?? silentLogger;
    const base = { router: target.hostname, address: target.address, action };

    logger.info(`${VERB[action].doing} ${target.hostname}...`);

    let session: DeviceSession;
    try {
        const credentials = await deps.credentials.resolve(target.address, target.credentials);
        session = deps.openSession(target, credentials);
        await session.connect();
    } catch (error) {
        logger.error(`Failed to connect to ${target.address}`, { router: target.hostname });
        return { ...base, success: false, output: `Connection failed: ${error instanceof Error ? error.message : String(error)}` };
    }

    try {
        const result = await run(session, action);
        if (result.success) {
            logger.info(`Successfully ${VERB[action].done} ${target.address}`);
        } else {
            logger.error(`Failed on ${target.address}: ${result.output}`, { router: target.hostname, action });
        }
        return { ...base, ...result };
    } finally {
        await session.disconnect();
    }
}

export const commitRouter = (target: RouterTarget, deps: FollowUpDeps) => followUp(target, 'commit', deps);

export const rollbackRouter = (target: RouterTarget, deps: FollowUpDeps) => followUp(target, 'rollback', deps);

export async function followUpAll(targets: RouterTarget[], action: FollowUpAction, deps: FollowUpDeps): Promise<FollowUpSummary> {
    const outcomes: FollowUpOutcome[] = [];
    for (const target of targets) {
        outcomes.push(await followUp(target, action, deps));
    }

    const succeeded = outcomes.filter(o => o.success).length;
    return { outcomes, succeeded, failed: outcomes.length - succeeded };
}

export interface SelectOptions {
    port?: number; // used when the document gives none
}

/**
 * `all` expands to every router in the document that has an address;
 * anything else is taken as a single router address.
 */
export function selectTargets(selector: string, config: DeploymentConfig | null, options: SelectOptions = {}): RouterTarget[] {
    if (selector.toLowerCase() !== ALL_ROUTERS) {
        const known = config?.routers.find(r => r.ip === selector);
        return [{
            hostname: known?.hostname ?? selector,
            address: selector,
            port: known?.port ?? options.port ?? DEFAULT_SSH_PORT,
            credentials: { username: known?.username, password: known?.password },
        }];
    }

    const targets: RouterTarget[] = [];
    for (const router of config?.routers ?? []) {
        if (!router.ip) continue;
        targets.push({
            hostname: router.hostname ?? router.ip,
            address: router.ip,
            port: router.port ?? options.port ?? DEFAULT_SSH_PORT,
            credentials: { username: router.username, password: router.password },
        });
    }
    return targets;
}
