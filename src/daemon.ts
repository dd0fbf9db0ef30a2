import {createServer, type Server, Socket} from 'net';
import {existsSync, mkdirSync, readFileSync, unlinkSync} from 'fs';
import {writeFile, unlink} from 'fs/promises';
import type {
	Config, StatusFile, Command, Response,
} from './types.js';
import {
	getSocketPath, getStatusPath, getLogsDir, getLogPath, getStateDir,
} from './config.js';
import {DockerDriver} from './docker-driver.js';
import type {ServiceDriver} from './driver.js';
import {errorMessage} from './errors.js';
import {ProcessDriver} from './process-driver.js';
import {Sequencer, type SequencerOptions} from './sequencer.js';

export type DriverName = 'process' | 'docker';

export type DaemonOptions = SequencerOptions & {
	/** Only bring up this service and its dependencies. */
	onlyService?: string;
	driver?: DriverName;
	/** Called once `down` or a signal has stopped every service. */
	onShutdown?: () => void;
};

export function createDriver(name: DriverName, config: Config, cwd: string): ServiceDriver {
	return name === 'docker'
		? new DockerDriver({cwd, project: config.name})
		: new ProcessDriver({cwd});
}

export class Daemon {
	private readonly sequencer: Sequencer;
	private server: Server | null = null;
	private statusWriteInterval: NodeJS.Timeout | null = null;
	private readonly startedAt: string;
	private shuttingDown = false;

	constructor(
		private readonly config: Config,
		private readonly cwd: string = process.cwd(),
		private readonly options: DaemonOptions = {},
		driver: ServiceDriver = createDriver(options.driver ?? 'process', config, cwd),
	) {
		this.startedAt = new Date().toISOString();
		this.sequencer = new Sequencer(config.services, driver, options);
	}

	async start(): Promise<void> {
		mkdirSync(getStateDir(this.cwd), {recursive: true});
		mkdirSync(getLogsDir(this.cwd), {recursive: true});

		// Check if socket already exists (another daemon running?)
		const socketPath = getSocketPath(this.cwd);
		if (existsSync(socketPath)) {
			const isRunning = await this.checkExistingDaemon(socketPath);
			if (isRunning) {
				throw new Error('Daemon already running. Use "rollcall down" to stop it.');
			}

			// Stale socket, remove it
			await unlink(socketPath);
		}

		// Services are in scope before the first status can be read
		this.sequencer.up(this.options.onlyService).catch((err: unknown) => {
			console.error(`Startup failed: ${errorMessage(err)}`);
		});

		try {
			await this.startSocketServer();
		} catch (err) {
			await this.sequencer.shutdown();
			throw err;
		}

		this.statusWriteInterval = setInterval(() => {
			this.writeStatus().catch((err: unknown) => {
				console.error(`Failed to write status: ${errorMessage(err)}`);
			});
		}, 2000);
		await this.writeStatus();

		console.log(`Daemon started (pid ${process.pid})`);

		this.sequencer.waitUntilSettled().then(async (summary) => {
			console.log(summary.ok ? 'All services up' : 'Some services failed to come up');
			await this.writeStatus();
		}).catch((err: unknown) => {
			console.error(`Failed to report startup: ${errorMessage(err)}`);
		});
	}

	private async checkExistingDaemon(socketPath: string): Promise<boolean> {
		return new Promise((resolve) => {
			const client = new Socket();
			client.setTimeout(1000);

			client.on('connect', () => {
				client.destroy();
				resolve(true);
			});

			client.on('error', () => {
				resolve(false);
			});

			client.on('timeout', () => {
				client.destroy();
				resolve(false);
			});

			client.connect(socketPath);
		});
	}

	private async startSocketServer(): Promise<void> {
		const socketPath = getSocketPath(this.cwd);

		return new Promise((resolve, reject) => {
			this.server = createServer((socket) => {
				let buffer = '';

				socket.on('error', (err) => {
					// EPIPE, ECONNRESET are normal when client disconnects
					const {code} = err as NodeJS.ErrnoException;
					if (code !== 'EPIPE' && code !== 'ECONNRESET') {
						console.error('Socket error:', err.message);
					}
				});

				socket.on('data', async (data) => {
					buffer += data.toString();
					const lines = buffer.split('\n');
					buffer = lines.pop() ?? '';

					for (const line of lines) {
						if (line.trim()) {
							let response: Response;
							try {
								response = await this.handleCommand(JSON.parse(line) as Command);
							} catch (err) {
								response = {ok: false, error: errorMessage(err)};
							}

							if (!socket.destroyed) {
								socket.write(`${JSON.stringify(response)}\n`);
							}
						}
					}
				});
			});

			this.server.on('error', reject);
			this.server.listen(socketPath, () => {
				resolve();
			});
		});
	}

	private async handleCommand(cmd: Command): Promise<Response> {
		switch (cmd.cmd) {
			case 'status':
				return {ok: true, data: this.getStatusData()};

			case 'start':
				this.checkService(cmd.service);
				// Dependencies may take a while to turn healthy; don't hold the client
				(cmd.service ? this.sequencer.start(cmd.service) : this.sequencer.up()).catch((err: unknown) => {
					console.error(`Start failed: ${errorMessage(err)}`);
				});
				return {ok: true};

			case 'stop':
				this.checkService(cmd.service);
				await this.sequencer.stop(cmd.service);
				return {ok: true};

			case 'restart':
				this.checkService(cmd.service);
				await this.sequencer.stop(cmd.service);
				this.sequencer.up(cmd.service).catch((err: unknown) => {
					console.error(`Restart failed: ${errorMessage(err)}`);
				});
				return {ok: true};

			case 'logs': {
				const logPath = getLogPath(cmd.service, this.cwd);
				if (!existsSync(logPath)) {
					return {ok: false, error: `No logs for ${cmd.service}`};
				}

				const content = readFileSync(logPath, 'utf-8');
				const lines = content.split('\n');
				const lastN = lines.slice(-(cmd.lines ?? 50)).join('\n');
				return {ok: true, data: lastN};
			}

			case 'down':
				// Respond before the socket closes
				setImmediate(() => {
					this.shutdown().catch((err: unknown) => {
						console.error(`Shutdown failed: ${errorMessage(err)}`);
					});
				});
				return {ok: true};
		}
	}

	private checkService(service: string | undefined): void {
		if (service !== undefined && !this.config.services.some((svc) => svc.name === service)) {
			throw new Error(`Unknown service: ${service}`);
		}
	}

	private getStatusData(running = true): StatusFile {
		return {
			updatedAt: new Date().toISOString(),
			daemon: running
				? {pid: process.pid, startedAt: this.startedAt, socket: getSocketPath(this.cwd)}
				: null,
			settled: this.sequencer.isSettled(),
			ok: this.sequencer.summary().ok,
			services: this.sequencer.status(),
		};
	}

	private async writeStatus(running = true): Promise<void> {
		await writeFile(getStatusPath(this.cwd), JSON.stringify(this.getStatusData(running), null, 2));
	}

	/** Synchronously kill all service processes - used during crash handling */
	emergencyKillChildren(type: 'uncaughtException' | 'unhandledRejection', err: Error): void {
		console.error(`\n${'='.repeat(60)}`);
		console.error(`[rollcall] Fatal ${type}: ${err.message}`);
		console.error(err.stack ?? '');
		console.error(`${'='.repeat(60)}`);

		for (const [name, state] of Object.entries(this.sequencer.status())) {
			if (state.pid) {
				try {
					// Services run as process group leaders
					process.kill(-state.pid, 'SIGKILL');
					console.log(`Killed ${name} (pid ${state.pid})`);
				} catch (killErr) {
					console.error(`Could not kill ${name} (pid ${state.pid}): ${errorMessage(killErr)}`);
				}
			}
		}

		const socketPath = getSocketPath(this.cwd);
		if (existsSync(socketPath)) {
			try {
				unlinkSync(socketPath);
			} catch (unlinkErr) {
				console.error(`Could not remove ${socketPath}: ${errorMessage(unlinkErr)}`);
			}
		}
	}

	/** Stop every service in reverse dependency order, then close the socket. */
	async shutdown(): Promise<void> {
		if (this.shuttingDown) {
			return;
		}

		this.shuttingDown = true;
		console.log('Shutting down...');

		if (this.statusWriteInterval) {
			clearInterval(this.statusWriteInterval);
		}

		await this.sequencer.shutdown();

		this.server?.close();

		const socketPath = getSocketPath(this.cwd);
		if (existsSync(socketPath)) {
			await unlink(socketPath);
		}

		await this.writeStatus(false);

		console.log('Daemon stopped');
		this.options.onShutdown?.();
	}
}

export async function startDaemon(config: Config, cwd?: string, options?: DaemonOptions): Promise<void> {
	const daemon = new Daemon(config, cwd, {
		...options,
		onShutdown() {
			process.exit(0);
		},
	});

	const stop = () => {
		daemon.shutdown().catch((err: unknown) => {
			console.error(`Shutdown failed: ${errorMessage(err)}`);
			process.exit(1);
		});
	};

	process.on('SIGTERM', stop);
	process.on('SIGINT', stop);

	// Kill children rather than orphan them if the daemon itself crashes
	process.on('uncaughtException', (err) => {
		daemon.emergencyKillChildren('uncaughtException', err);
		process.exit(1);
	});
	process.on('unhandledRejection', (reason) => {
		const err = reason instanceof Error ? reason : new Error(String(reason));
		daemon.emergencyKillChildren('unhandledRejection', err);
		process.exit(1);
	});

	await daemon.start();

	// Keep process alive - empty executor is intentional
	// eslint-disable-next-line @typescript-eslint/no-empty-function
	await new Promise(() => {});
}
