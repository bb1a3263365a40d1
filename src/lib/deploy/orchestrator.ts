import { addMinutes, format } from 'date-fns';
import { compile, policyComment } from '../bgp/compiler';
import { LookupToolMissingError } from '../bgp/lookup';
import { LookupFn } from '../bgp/types';
import { CredentialResolver } from '../config/credentials';
import { DeploymentConfig, GlobalDefaults, RouterDescriptor, toPolicySpec, toRouterTarget } from '../config/loader';
import { DeviceSession, MAX_CONFIRM_MINUTES, MIN_CONFIRM_MINUTES, SessionFactory } from '../device/session';
import { RouterTarget } from '../device/types';
import { Logger, silentLogger } from '../logging/logger';
import { ArtifactWriter } from './artifact';
import { DeploymentOutcome, DeploymentRun, PendingConfirmation, PolicyBlock } from './types';

export const DEFAULT_CONFIRM_MINUTES = 3;

export interface OrchestratorDeps {
    lookup: LookupFn;
    openSession: SessionFactory;
    writeArtifact: ArtifactWriter;
    credentials: CredentialResolver;
    logger?: Logger;
    now?: () => Date;
}

export interface RunOptions {
    apply: boolean;
    confirmMinutes: number;
}

interface RouterRun {
    outcome: DeploymentOutcome;
    pending?: PendingConfirmation;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Walks routers and their policies in declared order, one router at a time.
 * Each router gets at most one session and exactly one apply call carrying
 * every compiled policy, so a single rollback window covers the whole batch.
 */
export class DeploymentOrchestrator {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(private readonly deps: OrchestratorDeps) {
        this.logger = deps.logger ?? silentLogger;
        this.now = deps.now ?? (() => new Date());
    }

    async run(config: DeploymentConfig, options: RunOptions): Promise<DeploymentRun> {
        if (options.apply && (!Number.isInteger(options.confirmMinutes)
            || options.confirmMinutes < MIN_CONFIRM_MINUTES || options.confirmMinutes > MAX_CONFIRM_MINUTES)) {
            throw new RangeError(`rollback minutes must be an integer between ${MIN_CONFIRM_MINUTES} and ${MAX_CONFIRM_MINUTES}`);
        }

        const generatedAt = this.now();
        const outcomes: DeploymentOutcome[] = [];
        const pendingConfirmations: PendingConfirmation[] = [];
        const claimed = new Set<string>(); // addresses that already had a session this run

        try {
            for (const [index, router] of config.routers.entries()) {
                const { outcome, pending } = await this.deployRouter(router, index, config.global, options, generatedAt, claimed);
                outcomes.push(Object.freeze(outcome));
                if (pending) pendingConfirmations.push(pending);
            }
        } catch (error) {
            // Nobody receives the pending sessions once the run aborts
            for (const pending of pendingConfirmations) {
                await pending.session.detach();
            }
            throw error;
        }

        return {
            outcomes,
            policiesSucceeded: outcomes.reduce((n, o) => n + o.policiesSucceeded, 0),
            policiesFailed: outcomes.reduce((n, o) => n + o.policiesFailed, 0),
            pendingConfirmations,
        };
    }

    private async deployRouter(
        router: RouterDescriptor,
        index: number,
        defaults: GlobalDefaults,
        options: RunOptions,
        generatedAt: Date,
        claimed: Set<string>,
    ): Promise<RouterRun> {
        const target = toRouterTarget(router);
        if (!target) {
            this.logger.warn(`Skipping router with missing hostname or IP: routers[${index}]`);
            return {
                outcome: {
                    router: router.hostname ?? router.ip ?? `routers[${index}]`,
                    address: router.ip ?? null,
                    success: false,
                    output: 'Missing hostname or IP',
                    configFile: null,
                    manualCommitRequired: false,
                    policiesSucceeded: 0,
                    policiesFailed: 0,
                },
            };
        }

        this.logger.info(`Processing router: ${target.hostname} (${target.address})`);

        let session: DeviceSession | null = null;
        if (options.apply) {
            if (claimed.has(target.address)) {
                this.logger.error(`Duplicate router address ${target.address}, skipping ${target.hostname}`, { router: target.hostname });
                return { outcome: this.failed(target, `Duplicate router address: ${target.address}`, 0, 0) };
            }
            claimed.add(target.address);

            try {
                session = await this.open(target);
            } catch (error) {
                this.logger.error(`Failed to connect to ${target.hostname}, skipping...`, { router: target.hostname });
                return { outcome: this.failed(target, `Connection failed: ${describe(error)}`, 0, 0) };
            }
        }

        let keepAlive = false;
        try {
            const { blocks, failed } = await this.compilePolicies(router, defaults);

            if (blocks.length === 0) {
                this.logger.error(`No policies generated for ${target.hostname}`, { router: target.hostname });
                return { outcome: this.failed(target, 'No policies generated', 0, failed) };
            }

            const configFile = await this.deps.writeArtifact({
                hostname: target.hostname,
                address: target.address,
                generatedAt,
                blocks,
            });
            this.logger.info(`Configuration written to: ${configFile}`, { router: target.hostname });

            if (!session) {
                return {
                    outcome: {
                        router: target.hostname,
                        address: target.address,
                        success: true,
                        output: '',
                        configFile,
                        manualCommitRequired: false,
                        policiesSucceeded: blocks.length,
                        policiesFailed: failed,
                    },
                };
            }

            this.logger.info(`Applying configuration to ${target.hostname}...`);
            // Policy order is kept; each block keeps its own statement order
            const statements = blocks.flatMap(block => block.statements);
            const result = await session.applyWithConfirmedCommit(statements, options.confirmMinutes);

            const outcome: DeploymentOutcome = {
                router: target.hostname,
                address: target.address,
                success: result.success,
                output: result.output,
                configFile,
                manualCommitRequired: result.manualCommitRequired,
                policiesSucceeded: result.success ? blocks.length : 0,
                policiesFailed: result.success ? failed : failed + blocks.length,
            };

            if (!result.success) {
                this.logger.error(`Failed to apply configuration: ${result.output}`, { router: target.hostname });
                return { outcome };
            }

            if (!result.manualCommitRequired) {
                this.logger.info('Configuration applied successfully', { router: target.hostname });
                return { outcome };
            }

            keepAlive = true;
            const appliedAt = this.now();
            this.logger.warn(
                `Configuration applied with commit confirmed ${options.confirmMinutes} minutes. ` +
                `${target.hostname} rolls back at ${format(addMinutes(appliedAt, options.confirmMinutes), 'HH:mm:ss')} ` +
                `unless committed. To make the changes permanent, run: bgp-filter-deploy --commit ${target.address}`,
                { router: target.hostname, confirmMinutes: options.confirmMinutes },
            );

            return {
                outcome,
                pending: {
                    router: target.hostname,
                    address: target.address,
                    session,
                    appliedAt,
                    confirmMinutes: options.confirmMinutes,
                },
            };
        } catch (error) {
            if (error instanceof LookupToolMissingError) throw error;

            this.logger.error(`Deployment to ${target.hostname} failed: ${describe(error)}`, { router: target.hostname });
            return { outcome: this.failed(target, `Deployment failed: ${describe(error)}`, 0, router.policies.length) };
        } finally {
            if (session && !keepAlive) {
                await session.disconnect();
            }
        }
    }

    private async open(target: RouterTarget): Promise<DeviceSession> {
        const credentials = await this.deps.credentials.resolve(target.address, target.credentials);
        const session = this.deps.openSession(target, credentials);
        await session.connect();
        return session;
    }

    private async compilePolicies(router: RouterDescriptor, defaults: GlobalDefaults): Promise<{ blocks: PolicyBlock[]; failed: number }> {
        const blocks: PolicyBlock[] = [];
        let failed = 0;

        for (const descriptor of router.policies) {
            const policy = toPolicySpec(descriptor, defaults);
            if (!policy) {
                this.logger.warn(`Skipping policy with missing name or AS set: ${descriptor.name ?? descriptor.asSet ?? '(unnamed)'}`);
                failed++;
                continue;
            }

            this.logger.info(`Generating policy: ${policy.name} for ${policy.asSet}`);

            const looked = await this.deps.lookup({
                policyName: policy.name,
                asSet: policy.asSet,
                registry: policy.registry,
                maxLength: policy.maxLength,
            });
            if (!looked.ok) {
                this.logger.error(`Failed to generate prefix list for ${policy.name}`, { policy: policy.name, reason: looked.failure.kind });
                failed++;
                continue;
            }

            const statements = compile(looked.result, policy.name);
            if (!statements) {
                this.logger.error(`No route-filter entries for ${policy.name} (${policy.asSet})`, { policy: policy.name });
                failed++;
                continue;
            }

            blocks.push({ policy, statements: [policyComment(policy.name, policy.asSet), ...statements] });
        }

        return { blocks, failed };
    }

    private failed(target: RouterTarget, output: string, succeeded: number, failed: number): DeploymentOutcome {
        return {
            router: target.hostname,
            address: target.address,
            success: false,
            output,
            configFile: null,
            manualCommitRequired: false,
            policiesSucceeded: succeeded,
            policiesFailed: failed,
        };
    }
}

export function logRunSummary(run: DeploymentRun, options: RunOptions, logger: Logger): void {
    const succeeded = run.outcomes.filter(o => o.success).length;

    logger.info('Deployment summary', {
        routers: run.outcomes.length,
        routersSucceeded: succeeded,
        routersFailed: run.outcomes.length - succeeded,
        policiesSucceeded: run.policiesSucceeded,
        policiesFailed: run.policiesFailed,
    });

    if (succeeded < run.outcomes.length || run.policiesFailed > 0) {
        logger.warn('Some configurations failed. Check the logs for details.');
    }

    if (!options.apply) {
        logger.info("Configuration generation complete. To apply these configurations, run with '--apply'.");
        return;
    }

    if (run.pendingConfirmations.length > 0) {
        logger.warn(
            `IMPORTANT: commit the changes within ${options.confirmMinutes} minutes to make them permanent. ` +
            `Use '--commit <router_ip>' or '--commit all'.`,
            { pending: run.pendingConfirmations.map(p => p.address).join(',') },
        );
    }
}
