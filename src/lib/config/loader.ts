import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { PolicySpec } from '../bgp/types';
import { RouterTarget } from '../device/types';

export const DEFAULT_RIR = 'AFRINIC';
export const DEFAULT_MAX_PREFIX_LENGTH = 24;
export const DEFAULT_SSH_PORT = 22;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface GlobalDefaults {
    defaultRir: string;
    defaultMaxPrefixLength: number;
    logLevel?: string;
}

// Fields stay optional: an incomplete router or policy is skipped, not fatal.
export interface PolicyDescriptor {
    name?: string;
    asSet?: string;
    rir?: string;
    maxPrefixLength?: number;
    description?: string;
}

export interface RouterDescriptor {
    hostname?: string;
    ip?: string;
    username?: string;
    password?: string;
    port?: number;
    policies: PolicyDescriptor[];
}

export interface DeploymentConfig {
    global: GlobalDefaults;
    routers: RouterDescriptor[];
}

type Doc = Record<string, unknown>;

function isRecord(value: unknown): value is Doc {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(doc: Doc, key: string): string | undefined {
    const value = doc[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number') return String(value); // e.g. as_set: 65530
    return undefined;
}

function int(doc: Doc, key: string, where: string): number | undefined {
    const value = doc[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
    throw new ConfigError(`${where}: '${key}' must be an integer`);
}

function parsePolicy(value: unknown, where: string): PolicyDescriptor {
    if (!isRecord(value)) return {};
    return {
        name: str(value, 'name'),
        asSet: str(value, 'as_set'),
        rir: str(value, 'rir'),
        maxPrefixLength: int(value, 'max_prefix_length', where),
        description: str(value, 'description'),
    };
}

function parseRouter(value: unknown, index: number): RouterDescriptor {
    const where = `routers[${index}]`;
    if (!isRecord(value)) return { policies: [] };

    const policies = Array.isArray(value.policies) ? value.policies : [];
    return {
        hostname: str(value, 'hostname'),
        ip: str(value, 'ip'),
        username: str(value, 'username'),
        password: str(value, 'password'),
        port: int(value, 'port', where),
        policies: policies.map((p, i) => parsePolicy(p, `${where}.policies[${i}]`)),
    };
}

export function parseConfig(text: string): DeploymentConfig {
    let doc: unknown;
    try {
        doc = parseYaml(text);
    } catch (error) {
        throw new ConfigError(`Error parsing YAML config: ${error instanceof Error ? error.message : String(error)}`);
    }

    const routers = isRecord(doc) ? doc.routers : undefined;
    if (!isRecord(doc) || !Array.isArray(routers)) {
        throw new ConfigError("Missing 'routers' section in config");
    }

    const global: Doc = isRecord(doc.global) ? doc.global : {};

    return {
        global: {
            defaultRir: str(global, 'default_rir') ?? DEFAULT_RIR,
            defaultMaxPrefixLength: int(global, 'default_max_prefix_length', 'global') ?? DEFAULT_MAX_PREFIX_LENGTH,
            logLevel: str(global, 'log_level'),
        },
        routers: routers.map(parseRouter),
    };
}

export async function loadConfig(file: string): Promise<DeploymentConfig> {
    let text: string;
    try {
        text = await readFile(file, 'utf8');
    } catch (error) {
        throw new ConfigError(`Error loading config ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseConfig(text);
}

export function toRouterTarget(router: RouterDescriptor): RouterTarget | null {
    if (!router.hostname || !router.ip) return null;
    return {
        hostname: router.hostname,
        address: router.ip,
        port: router.port ?? DEFAULT_SSH_PORT,
        credentials: { username: router.username, password: router.password },
    };
}

export function toPolicySpec(policy: PolicyDescriptor, defaults: GlobalDefaults): PolicySpec | null {
    if (!policy.name || !policy.asSet) return null;
    return {
        name: policy.name,
        asSet: policy.asSet,
        registry: policy.rir ?? defaults.defaultRir,
        maxLength: policy.maxPrefixLength ?? defaults.defaultMaxPrefixLength,
    };
}
