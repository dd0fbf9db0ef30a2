import {spawn, type ChildProcess} from 'child_process';
import {createWriteStream, mkdirSync, type WriteStream} from 'fs';
import {getLogPath, getLogsDir} from './config.js';
import {errorMessage} from './errors.js';
import {sleep} from './sleep.js';
import type {ServiceDriver, ServiceHandle} from './driver.js';
import type {CommandLine, HealthCommand, ServiceSpec} from './types.js';

export type ProcessDriverOptions = {
	/** Project directory; logs go to .rollcall/logs below it. */
	cwd?: string;
	/** Grace period between SIGTERM and SIGKILL. */
	stopTimeoutMs?: number;
	/** Base environment the service environment is layered on. */
	hostEnv?: NodeJS.ProcessEnv;
};

export type LaunchCommand = {
	file: string;
	args: string[];
	shell: boolean;
};

type RunningProcess = {
	spec: ServiceSpec;
	child: ChildProcess;
	exited: Promise<number | null>;
};

export const quoteShellArg = (arg: string) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replaceAll('\'', '\'\\\'\'')}'`);

const toShell = (line: CommandLine) => (typeof line === 'string' ? line : line.map(quoteShellArg).join(' '));

// How long output may keep arriving after the process itself has exited
const OUTPUT_DRAIN_MS = 500;

/**
 * Runs each service's entrypoint and command as a local child process.
 * Output is appended to the service's log file; health checks run on the host.
 */
export class ProcessDriver implements ServiceDriver {
	private readonly running = new Map<string, RunningProcess>();
	private nextId = 1;

	constructor(protected readonly options: ProcessDriverOptions = {}) {}

	protected get cwd(): string {
		return this.options.cwd ?? process.cwd();
	}

	/** Entrypoint and command as lists run without a shell; if either is a string both go through one. */
	protected launchCommand(spec: ServiceSpec): LaunchCommand {
		const parts = [spec.entrypoint, spec.command].filter((part): part is CommandLine => part !== undefined);
		if (parts.length === 0) {
			throw new Error(`${spec.name} has no entrypoint or command to run`);
		}

		const argv: string[] = [];
		for (const part of parts) {
			if (typeof part === 'string') {
				return {file: parts.map(toShell).join(' '), args: [], shell: true};
			}

			argv.push(...part);
		}

		const [file, ...args] = argv;
		if (!file) {
			throw new Error(`${spec.name} has an empty command`);
		}

		return {file, args, shell: false};
	}

	protected healthCommand(_spec: ServiceSpec, command: HealthCommand): LaunchCommand {
		if (command.kind === 'shell') {
			return {file: command.script, args: [], shell: true};
		}

		const [file = '', ...args] = command.argv;
		return {file, args, shell: false};
	}

	async start(spec: ServiceSpec): Promise<ServiceHandle> {
		const launch = this.launchCommand(spec);

		mkdirSync(getLogsDir(this.cwd), {recursive: true});
		const logStream = createWriteStream(getLogPath(spec.name, this.cwd), {flags: 'a'});

		const child = spawn(launch.file, launch.args, {
			shell: launch.shell,
			cwd: spec.workingDir ?? this.cwd,
			env: {...(this.options.hostEnv ?? process.env), ...spec.environment},
			stdio: ['ignore', 'pipe', 'pipe'],
			// Own process group, so stop reaches whatever a shell command forked
			detached: true,
		});

		try {
			await new Promise<void>((resolve, reject) => {
				child.once('spawn', () => {
					child.off('error', reject);
					resolve();
				});
				child.once('error', reject);
			});
		} catch (err) {
			logStream.end();
			throw err;
		}

		const id = `${spec.name}-${this.nextId++}`;
		pipeToLog(child, logStream);
		child.on('error', (err) => {
			logStream.write(`[${new Date().toISOString()}] [ERR] ${err.message}\n`);
		});

		const exited = new Promise<number | null>((resolve) => {
			let drain: NodeJS.Timeout | undefined;
			child.once('exit', () => {
				this.running.delete(id);
				// A background grandchild can hold the pipes open; stop reading after a short drain
				drain = setTimeout(() => {
					child.stdout?.destroy();
					child.stderr?.destroy();
				}, OUTPUT_DRAIN_MS);
			});
			child.once('close', (code) => {
				clearTimeout(drain);
				logStream.end(() => {
					resolve(code);
				});
			});
		});

		this.running.set(id, {spec, child, exited});
		return {
			id, service: spec.name, pid: child.pid ?? null, exited,
		};
	}

	async stop(handle: ServiceHandle): Promise<void> {
		const proc = this.running.get(handle.id);
		if (!proc) {
			return;
		}

		await this.terminate(proc.spec, proc.child, proc.exited);
	}

	async runHealthCheck(handle: ServiceHandle, command: HealthCommand, timeoutMs: number): Promise<boolean> {
		const proc = this.running.get(handle.id);
		if (!proc) {
			return false;
		}

		const launch = this.healthCommand(proc.spec, command);
		return new Promise((resolve) => {
			const check = spawn(launch.file, launch.args, {
				shell: launch.shell,
				cwd: proc.spec.workingDir ?? this.cwd,
				env: {...(this.options.hostEnv ?? process.env), ...proc.spec.environment},
				stdio: 'ignore',
				timeout: timeoutMs,
			});
			check.once('error', () => {
				resolve(false);
			});
			check.once('exit', (code) => {
				resolve(code === 0);
			});
		});
	}

	protected async terminate(_spec: ServiceSpec, child: ChildProcess, exited: Promise<number | null>): Promise<void> {
		const graceMs = this.options.stopTimeoutMs ?? 5000;
		const deadline = Date.now() + graceMs;
		signalGroup(child, 'SIGTERM');

		const timeout = setTimeout(() => {
			signalGroup(child, 'SIGKILL');
		}, graceMs);

		await exited;

		// Processes the service forked get what is left of the grace period
		while (isGroupAlive(child) && Date.now() < deadline) {
			// eslint-disable-next-line no-await-in-loop
			await sleep(50);
		}

		clearTimeout(timeout);
		if (isGroupAlive(child)) {
			signalGroup(child, 'SIGKILL');
		}
	}
}

function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
	if (child.pid === undefined) {
		child.kill(signal);
		return;
	}

	try {
		process.kill(-child.pid, signal);
	} catch (err) {
		// ESRCH: the whole group is already gone
		const {code} = err as NodeJS.ErrnoException;
		if (code !== 'ESRCH') {
			console.error(`Could not send ${signal} to process group ${child.pid}: ${errorMessage(err)}`);
		}
	}
}

function isGroupAlive(child: ChildProcess): boolean {
	if (child.pid === undefined) {
		return false;
	}

	try {
		process.kill(-child.pid, 0);
		return true;
	} catch {
		return false;
	}
}

function pipeToLog(child: ChildProcess, logStream: WriteStream): void {
	const logLine = (prefix: string) => (data: Buffer) => {
		const timestamp = new Date().toISOString();
		const lines = data.toString().split('\n');
		for (const line of lines) {
			if (line) {
				logStream.write(`[${timestamp}]${prefix} ${line}\n`);
			}
		}
	};

	child.stdout?.on('data', logLine(''));
	child.stderr?.on('data', logLine(' [ERR]'));
}
