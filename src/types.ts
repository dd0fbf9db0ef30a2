export type RestartPolicyName = 'always' | 'unless-stopped' | 'on-failure' | 'never';

export type RestartPolicy = {
	name: RestartPolicyName;
	maxRetries?: number; // Only meaningful for on-failure:N
};

export type DependencyCondition = 'started' | 'healthy' | 'completed';

export type DependencyRef = {
	service: string;
	condition: DependencyCondition;
};

export type HealthCommand =
	| {kind: 'exec'; argv: string[]}
	| {kind: 'shell'; script: string};

export type HealthCheck = {
	command: HealthCommand;
	intervalMs: number;
	timeoutMs: number;
	retries: number;
	startPeriodMs: number;
};

export type PortMapping = {
	hostIp?: string;
	host: number;
	container: number;
	protocol: 'tcp' | 'udp';
};

// A shell string, or an argv list run without a shell
export type CommandLine = string | string[];

export type ServiceSpec = {
	name: string;
	image?: string;
	containerName?: string;
	platform?: string;
	entrypoint?: CommandLine;
	command?: CommandLine;
	workingDir?: string;
	ports: PortMapping[];
	envFiles: string[];
	environment: Readonly<Record<string, string>>;
	restart: RestartPolicy;
	healthCheck?: HealthCheck;
	dependsOn: DependencyRef[];
};

export type Config = {
	name: string;
	path: string;
	services: ServiceSpec[];
};

export type ServiceStatus = 'pending' | 'starting' | 'started' | 'healthy' | 'failed' | 'stopped' | 'blocked';

export type ServiceState = {
	status: ServiceStatus;
	pid: number | null;
	restarts: number;
	exitCode?: number | null;
	lastError?: string;
	startedAt?: string;
	healthyAt?: string;
};

export type RunSummary = {
	ok: boolean;
	services: Record<string, ServiceState>;
};

export type DaemonState = {
	pid: number;
	startedAt: string;
	socket: string;
};

export type StatusFile = {
	updatedAt: string;
	daemon: DaemonState | null;
	settled: boolean;
	ok: boolean;
	services: Record<string, ServiceState>;
};

// Socket protocol
export type Command =
	| {cmd: 'status'}
	| {cmd: 'start'; service?: string}
	| {cmd: 'stop'; service?: string}
	| {cmd: 'restart'; service?: string}
	| {cmd: 'logs'; service: string; lines?: number}
	| {cmd: 'down'};

export type Response =
	| {ok: true; data?: unknown}
	| {ok: false; error: string};
