import {existsSync, readFileSync} from 'fs';
import {readFile} from 'fs/promises';
import {basename, dirname, resolve} from 'path';
import {parse as parseDotenv} from 'dotenv';
import {load as loadYaml} from 'js-yaml';
import * as v from 'valibot';
import {parseDuration} from './duration.js';
import {ConfigurationError, errorMessage} from './errors.js';
import {validateGraph} from './graph.js';
import type {
	CommandLine, Config, DependencyCondition, DependencyRef, HealthCheck, PortMapping, RestartPolicy, ServiceSpec,
} from './types.js';

const CONFIG_NAMES = [
	'rollcall.yaml',
	'rollcall.yml',
	'compose.yaml',
	'compose.yml',
	'docker-compose.yaml',
	'docker-compose.yml',
];

const DEFAULT_INTERVAL = '30s';
const DEFAULT_TIMEOUT = '30s';
const DEFAULT_RETRIES = 3;

const CommandLineSchema = v.union([v.string(), v.array(v.string())]);
const DurationSchema = v.union([v.string(), v.number()]);

const HealthcheckSchema = v.object({
	test: v.optional(CommandLineSchema),
	interval: v.optional(DurationSchema),
	timeout: v.optional(DurationSchema),
	retries: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
	start_period: v.optional(DurationSchema),
	disable: v.optional(v.boolean()),
});

const ConditionSchema = v.picklist(['service_started', 'service_healthy', 'service_completed_successfully']);

const DependsOnSchema = v.union([
	v.array(v.string()),
	v.record(v.string(), v.nullable(v.object({condition: v.optional(ConditionSchema)}))),
]);

const EnvValueSchema = v.nullable(v.union([v.string(), v.number(), v.boolean()]));

// Keys outside this schema (volumes, build, networks, ...) are dropped
const ServiceSchema = v.object({
	image: v.optional(v.string()),
	container_name: v.optional(v.string()),
	platform: v.optional(v.string()),
	entrypoint: v.optional(CommandLineSchema),
	command: v.optional(CommandLineSchema),
	working_dir: v.optional(v.string()),
	ports: v.optional(v.array(v.union([v.string(), v.number()]))),
	env_file: v.optional(v.union([v.string(), v.array(v.string())])),
	environment: v.optional(v.union([v.record(v.string(), EnvValueSchema), v.array(v.string())])),
	restart: v.optional(v.union([v.string(), v.literal(false)])),
	healthcheck: v.optional(HealthcheckSchema),
	depends_on: v.optional(DependsOnSchema),
});

const DocumentSchema = v.object({
	name: v.optional(v.string()),
	services: v.record(v.string(), v.nullable(ServiceSchema)),
});

type RawService = v.InferOutput<typeof ServiceSchema>;

export type ParseOptions = {
	/** Directory env_file and working_dir paths are resolved against. */
	baseDir: string;
	/** Shown in error messages and kept on the result. */
	path?: string;
	/** Consulted for `environment` entries given without a value. */
	hostEnv?: Readonly<Record<string, string | undefined>>;
};

export async function loadConfig(cwd: string = process.cwd(), file?: string): Promise<Config> {
	if (file) {
		return loadConfigFile(resolve(cwd, file));
	}

	for (const name of CONFIG_NAMES) {
		const configPath = resolve(cwd, name);
		if (existsSync(configPath)) {
			return loadConfigFile(configPath);
		}
	}

	throw new ConfigurationError(`No service document found. Create one of: ${CONFIG_NAMES.join(', ')}`);
}

export async function loadConfigFile(configPath: string): Promise<Config> {
	let content: string;
	try {
		content = await readFile(configPath, 'utf-8');
	} catch (err) {
		throw new ConfigurationError(`Cannot read ${configPath}: ${errorMessage(err)}`);
	}

	return parseConfig(content, {baseDir: dirname(configPath), path: configPath, hostEnv: process.env});
}

/** Parse and validate a YAML service document. Dependency cycles are rejected here. */
export function parseConfig(content: string, options: ParseOptions): Config {
	const source = options.path ?? '<inline>';

	let raw: unknown;
	try {
		raw = loadYaml(content);
	} catch (err) {
		throw new ConfigurationError(`Invalid YAML in ${source}: ${errorMessage(err)}`);
	}

	const result = v.safeParse(DocumentSchema, raw);
	if (!result.success) {
		const details = result.issues.map((issue) => {
			const path = v.getDotPath(issue);
			return path ? `  ${path}: ${issue.message}` : `  ${issue.message}`;
		});
		throw new ConfigurationError(`Invalid service document ${source}:\n${details.join('\n')}`);
	}

	const envFiles = new EnvFileCache();
	const services = Object.entries(result.output.services).map(([name, service]) =>
		normalizeService(name, service ?? {}, options, envFiles));

	validateGraph(services);

	return {
		name: result.output.name ?? basename(options.baseDir),
		path: options.path ?? options.baseDir,
		services,
	};
}

function normalizeService(name: string, raw: RawService, options: ParseOptions, envFiles: EnvFileCache): ServiceSpec {
	if (!/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/.test(name)) {
		throw new ConfigurationError(`Invalid service name: ${name}`);
	}

	const fail = (message: string) => new ConfigurationError(`services.${name}: ${message}`);
	const envFileList = raw.env_file === undefined ? [] : [raw.env_file].flat();

	let environment: Record<string, string> = {};
	for (const file of envFileList) {
		try {
			environment = {...environment, ...envFiles.read(resolve(options.baseDir, file))};
		} catch (err) {
			throw fail(`cannot read env_file ${file}: ${errorMessage(err)}`);
		}
	}

	environment = {...environment, ...normalizeEnvironment(raw.environment, options.hostEnv ?? {})};

	let healthCheck: HealthCheck | undefined;
	let ports: PortMapping[];
	let restart: RestartPolicy;
	try {
		healthCheck = normalizeHealthCheck(raw.healthcheck);
		ports = (raw.ports ?? []).map((port) => parsePort(port));
		restart = parseRestartPolicy(raw.restart);
	} catch (err) {
		throw fail(errorMessage(err));
	}

	return {
		name,
		image: raw.image,
		containerName: raw.container_name,
		platform: raw.platform,
		entrypoint: normalizeCommandLine(raw.entrypoint),
		command: normalizeCommandLine(raw.command),
		workingDir: raw.working_dir === undefined ? undefined : resolve(options.baseDir, raw.working_dir),
		ports,
		envFiles: envFileList,
		environment: Object.freeze(environment),
		restart,
		healthCheck,
		dependsOn: normalizeDependsOn(raw.depends_on),
	};
}

function normalizeCommandLine(value: CommandLine | undefined): CommandLine | undefined {
	if (value === undefined) {
		return undefined;
	}

	if (Array.isArray(value)) {
		return value.length === 0 ? undefined : value;
	}

	return value.trim() === '' ? undefined : value;
}

function normalizeEnvironment(
	environment: RawService['environment'],
	hostEnv: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
	const result: Record<string, string> = {};
	if (environment === undefined) {
		return result;
	}

	if (Array.isArray(environment)) {
		for (const entry of environment) {
			const eq = entry.indexOf('=');
			if (eq === -1) {
				const hostValue = hostEnv[entry];
				if (hostValue !== undefined) {
					result[entry] = hostValue;
				}
			} else {
				result[entry.slice(0, eq)] = entry.slice(eq + 1);
			}
		}

		return result;
	}

	for (const [key, value] of Object.entries(environment)) {
		if (value === null) {
			const hostValue = hostEnv[key];
			if (hostValue !== undefined) {
				result[key] = hostValue;
			}
		} else {
			result[key] = String(value);
		}
	}

	return result;
}

const CONDITIONS: Record<v.InferOutput<typeof ConditionSchema>, DependencyCondition> = {
	service_started: 'started',
	service_healthy: 'healthy',
	service_completed_successfully: 'completed',
};

function normalizeDependsOn(dependsOn: RawService['depends_on']): DependencyRef[] {
	if (dependsOn === undefined) {
		return [];
	}

	if (Array.isArray(dependsOn)) {
		return dependsOn.map((service) => ({service, condition: 'started'}));
	}

	return Object.entries(dependsOn).map(([service, options]) => ({
		service,
		condition: options?.condition ? CONDITIONS[options.condition] : 'started',
	}));
}

function normalizeHealthCheck(raw: RawService['healthcheck']): HealthCheck | undefined {
	if (!raw || raw.disable || raw.test === undefined) {
		return undefined;
	}

	let command: HealthCheck['command'];
	if (typeof raw.test === 'string') {
		command = {kind: 'shell', script: raw.test};
	} else {
		const [kind, ...rest] = raw.test;
		if (kind === 'NONE') {
			return undefined;
		}

		if (kind === 'CMD' && rest.length > 0) {
			command = {kind: 'exec', argv: rest};
		} else if (kind === 'CMD-SHELL' && rest.length > 0) {
			command = {kind: 'shell', script: rest.join(' ')};
		} else {
			throw new ConfigurationError('healthcheck.test must start with NONE, CMD or CMD-SHELL followed by a command');
		}
	}

	return {
		command,
		intervalMs: durationOrDefault(raw.interval, DEFAULT_INTERVAL),
		timeoutMs: durationOrDefault(raw.timeout, DEFAULT_TIMEOUT),
		retries: raw.retries ?? DEFAULT_RETRIES,
		startPeriodMs: parseDuration(raw.start_period ?? 0),
	};
}

// Zero means "use the default", as in compose
function durationOrDefault(value: string | number | undefined, fallback: string): number {
	const ms = value === undefined ? 0 : parseDuration(value);
	return ms > 0 ? ms : parseDuration(fallback);
}

/** Accepts "80", "8080:80", "127.0.0.1:8080:80" and a "/udp" or "/tcp" suffix. */
export function parsePort(value: string | number): PortMapping {
	if (typeof value === 'number') {
		return {host: checkPort(value, String(value)), container: checkPort(value, String(value)), protocol: 'tcp'};
	}

	const [mapping = '', protocol = 'tcp'] = value.split('/');
	if (protocol !== 'tcp' && protocol !== 'udp') {
		throw new ConfigurationError(`Invalid port protocol in ${value}`);
	}

	const parts = mapping.split(':');
	const toPort = (part: string | undefined) => checkPort(Number(part), value);

	switch (parts.length) {
		case 1:
			return {host: toPort(parts[0]), container: toPort(parts[0]), protocol};
		case 2:
			return {host: toPort(parts[0]), container: toPort(parts[1]), protocol};
		case 3:
			return {
				hostIp: parts[0], host: toPort(parts[1]), container: toPort(parts[2]), protocol,
			};
		default:
			throw new ConfigurationError(`Invalid port mapping: ${value}`);
	}
}

function checkPort(port: number, source: string): number {
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new ConfigurationError(`Invalid port mapping: ${source}`);
	}

	return port;
}

export function parseRestartPolicy(value: string | false | undefined): RestartPolicy {
	if (value === undefined || value === false || value === 'no' || value === 'never') {
		return {name: 'never'};
	}

	if (value === 'always' || value === 'unless-stopped') {
		return {name: value};
	}

	const match = /^on-failure(?::(\d+))?$/.exec(value);
	if (match) {
		return match[1] === undefined ? {name: 'on-failure'} : {name: 'on-failure', maxRetries: Number(match[1])};
	}

	throw new ConfigurationError(`Invalid restart policy: ${value}. Expected no, always, unless-stopped or on-failure[:max]`);
}

/** Env files shared by several services are read and parsed once per load. */
class EnvFileCache {
	private readonly files = new Map<string, Readonly<Record<string, string>>>();

	read(path: string): Readonly<Record<string, string>> {
		let parsed = this.files.get(path);
		if (!parsed) {
			parsed = Object.freeze(parseDotenv(readFileSync(path)));
			this.files.set(path, parsed);
		}

		return parsed;
	}
}

export function getStateDir(cwd: string = process.cwd()): string {
	return resolve(cwd, '.rollcall');
}

export function getSocketPath(cwd: string = process.cwd()): string {
	return resolve(getStateDir(cwd), 'rollcall.sock');
}

export function getStatusPath(cwd: string = process.cwd()): string {
	return resolve(getStateDir(cwd), 'status.json');
}

export function getLogsDir(cwd: string = process.cwd()): string {
	return resolve(getStateDir(cwd), 'logs');
}

export function getLogPath(service: string, cwd: string = process.cwd()): string {
	return resolve(getLogsDir(cwd), `${service}.log`);
}
