#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { createLookup, DEFAULT_LOOKUP_BINARY, LookupToolMissingError } from './lib/bgp/lookup';
import { CredentialResolver } from './lib/config/credentials';
import { ConfigError, DeploymentConfig, loadConfig } from './lib/config/loader';
import { interactivePrompt } from './lib/config/prompt';
import { createSessionFactory } from './lib/device/session';
import { createSshTransport } from './lib/device/ssh';
import { createArtifactWriter } from './lib/deploy/artifact';
import { ALL_ROUTERS, followUpAll, selectTargets } from './lib/deploy/followUp';
import { DEFAULT_CONFIRM_MINUTES, DeploymentOrchestrator, logRunSummary } from './lib/deploy/orchestrator';
import { DeploymentRun, FollowUpAction } from './lib/deploy/types';
import { createLogger, isLogLevel, Logger, LogLevel } from './lib/logging/logger';

export type CliOptions = {
    config: string;
    apply?: boolean;
    commit?: string;
    rollback?: string;
    rollbackMinutes: number;
    username?: string;
    password?: string;
    port?: number;
    outputDir: string;
    lookupBinary: string;
    logLevel?: LogLevel;
    logFile: string;
};

function parseInteger(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
    return n;
}

export function buildProgram(): Command {
    return new Command()
        .name('bgp-filter-deploy')
        .description('Generate and optionally apply BGP prefix list configurations to Juniper devices.')
        .option('-c, --config <file>', 'YAML configuration file', 'configs/prefix_policies.yaml')
        .addOption(new Option('--apply', 'apply configurations to devices with commit confirmed')
            .conflicts(['commit', 'rollback']))
        .addOption(new Option('--commit [router]', `commit pending changes on a router address, or "${ALL_ROUTERS}"`)
            .preset(ALL_ROUTERS)
            .conflicts(['rollback']))
        .addOption(new Option('--rollback [router]', `roll back to the previous committed configuration on a router address, or "${ALL_ROUTERS}"`)
            .preset(ALL_ROUTERS))
        .option('--rollback-minutes <n>', 'minutes before automatic rollback', parseInteger, DEFAULT_CONFIRM_MINUTES)
        .option('--username <name>', 'username for authentication (prompted when missing)')
        .option('--password <secret>', 'password for authentication (prompted when missing)')
        .option('--port <n>', 'SSH port when the configuration gives none (default: 22)', parseInteger)
        .option('--output-dir <dir>', 'directory for generated configurations', 'configs/generated')
        .option('--lookup-binary <path>', 'prefix list generator to run', DEFAULT_LOOKUP_BINARY)
        .addOption(new Option('--log-level <level>', 'log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--log-file <file>', 'audit log file', 'logs/bgp-filter-deploy.log');
}

function resolveLevel(opts: CliOptions, config: DeploymentConfig): LogLevel {
    if (opts.logLevel) return opts.logLevel;
    const fromConfig = config.global.logLevel?.toLowerCase();
    if (fromConfig === 'warning') return 'warn';
    return fromConfig && isLogLevel(fromConfig) ? fromConfig : 'info';
}

async function runFollowUp(action: FollowUpAction, selector: string, opts: CliOptions, config: DeploymentConfig,
    deps: { credentials: CredentialResolver; logger: Logger }): Promise<number> {
    const targets = selectTargets(selector, config, { port: opts.port });
    if (targets.length === 0) {
        deps.logger.error(`No routers with an address found for '${selector}'`);
        return 1;
    }

    const summary = await followUpAll(targets, action, {
        openSession: createSessionFactory(createSshTransport(), { logger: deps.logger }),
        credentials: deps.credentials,
        logger: deps.logger,
    });

    deps.logger.info(`${action === 'commit' ? 'Commit' : 'Rollback'} summary`, {
        total: summary.outcomes.length,
        succeeded: summary.succeeded,
        failed: summary.failed,
    });
    return summary.failed > 0 ? 1 : 0;
}

export async function main(argv: string[] = process.argv): Promise<number> {
    dotenv.config();

    const program = buildProgram();
    program.parse(argv);
    const opts = program.opts<CliOptions>();

    const bootstrap = createLogger({ level: opts.logLevel ?? 'info' });
    if (!existsSync(opts.config)) {
        bootstrap.error(`Config file not found: ${opts.config}`);
        return 1;
    }

    let config: DeploymentConfig;
    try {
        config = await loadConfig(opts.config);
    } catch (error) {
        if (error instanceof ConfigError) {
            bootstrap.error(error.message);
            return 1;
        }
        throw error;
    }

    const logger = createLogger({ level: resolveLevel(opts, config), auditFile: opts.logFile });
    const credentials = new CredentialResolver({
        flags: { username: opts.username, password: opts.password },
        env: process.env,
        prompt: interactivePrompt(),
    });

    if (opts.commit !== undefined) {
        return runFollowUp('commit', opts.commit, opts, config, { credentials, logger });
    }
    if (opts.rollback !== undefined) {
        return runFollowUp('rollback', opts.rollback, opts, config, { credentials, logger });
    }

    logger.info(`Using configuration file: ${opts.config}`);
    const orchestrator = new DeploymentOrchestrator({
        lookup: createLookup({ binary: opts.lookupBinary, logger }),
        openSession: createSessionFactory(createSshTransport(), { logger }),
        writeArtifact: createArtifactWriter(opts.outputDir),
        credentials,
        logger,
    });

    const options = { apply: opts.apply === true, confirmMinutes: opts.rollbackMinutes };
    let run: DeploymentRun;
    try {
        run = await orchestrator.run(config, options);
    } catch (error) {
        if (error instanceof LookupToolMissingError || error instanceof RangeError) {
            logger.error(error.message);
            return 1;
        }
        throw error;
    }

    logRunSummary(run, options, logger);

    // The process is about to exit; rollback timers keep running on the devices.
    for (const pending of run.pendingConfirmations) {
        await pending.session.detach();
    }

    return run.outcomes.every(o => o.success) ? 0 : 1;
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            createLogger().error(error instanceof Error ? error.stack ?? error.message : String(error));
            process.exitCode = 1;
        },
    );
}
