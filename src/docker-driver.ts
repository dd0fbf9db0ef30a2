import {spawn, type ChildProcess} from 'child_process';
import {ProcessDriver, type LaunchCommand, type ProcessDriverOptions} from './process-driver.js';
import type {CommandLine, HealthCommand, PortMapping, ServiceSpec} from './types.js';

export type DockerDriverOptions = ProcessDriverOptions & {
	/** Prefix for containers without a container_name. */
	project: string;
	/** Path or name of the docker binary. */
	docker?: string;
};

// Compose splits string entrypoints and commands into words; quoting inside them is not supported here
const words = (line: CommandLine | undefined): string[] => {
	if (line === undefined) {
		return [];
	}

	return typeof line === 'string' ? line.trim().split(/\s+/).filter(Boolean) : line;
};

const formatPort = (port: PortMapping) =>
	`${port.hostIp ? `${port.hostIp}:` : ''}${port.host}:${port.container}${port.protocol === 'udp' ? '/udp' : ''}`;

export function containerName(spec: ServiceSpec, project: string): string {
	return spec.containerName ?? `${project}-${spec.name}`;
}

/** Arguments for an attached `docker run` of one service. */
export function dockerRunArgs(spec: ServiceSpec, name: string): string[] {
	if (!spec.image) {
		throw new Error(`${spec.name} has no image`);
	}

	const args = ['run', '--rm', '--name', name];
	if (spec.platform) {
		args.push('--platform', spec.platform);
	}

	for (const port of spec.ports) {
		args.push('-p', formatPort(port));
	}

	for (const [key, value] of Object.entries(spec.environment)) {
		args.push('-e', `${key}=${value}`);
	}

	if (spec.workingDir) {
		args.push('-w', spec.workingDir);
	}

	const [entrypoint, ...entrypointArgs] = words(spec.entrypoint);
	if (entrypoint !== undefined) {
		args.push('--entrypoint', entrypoint);
	}

	args.push(spec.image, ...entrypointArgs, ...words(spec.command));
	return args;
}

export function dockerExecArgs(name: string, command: HealthCommand): string[] {
	return command.kind === 'exec'
		? ['exec', name, ...command.argv]
		: ['exec', name, 'sh', '-c', command.script];
}

/**
 * Runs each service as an attached `docker run` child, so the process machinery
 * of ProcessDriver (logs, exit tracking) applies unchanged.
 */
export class DockerDriver extends ProcessDriver {
	constructor(protected readonly dockerOptions: DockerDriverOptions) {
		super(dockerOptions);
	}

	private get docker(): string {
		return this.dockerOptions.docker ?? 'docker';
	}

	protected override launchCommand(spec: ServiceSpec): LaunchCommand {
		return {file: this.docker, args: dockerRunArgs(spec, containerName(spec, this.dockerOptions.project)), shell: false};
	}

	protected override healthCommand(spec: ServiceSpec, command: HealthCommand): LaunchCommand {
		return {file: this.docker, args: dockerExecArgs(containerName(spec, this.dockerOptions.project), command), shell: false};
	}

	protected override async terminate(spec: ServiceSpec, child: ChildProcess, exited: Promise<number | null>): Promise<void> {
		const seconds = Math.ceil((this.dockerOptions.stopTimeoutMs ?? 10000) / 1000);
		const stopped = await new Promise<boolean>((resolve) => {
			const stop = spawn(this.docker, ['stop', '-t', String(seconds), containerName(spec, this.dockerOptions.project)], {stdio: 'ignore'});
			stop.once('error', () => {
				resolve(false);
			});
			stop.once('exit', (code) => {
				resolve(code === 0);
			});
		});

		if (!stopped) {
			// Fall back to signalling the attached client
			await super.terminate(spec, child, exited);
			return;
		}

		await exited;
	}
}
