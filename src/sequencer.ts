import {
	ConfigurationError, DependencyBlockedError, StartError, errorMessage, type HealthCheckError,
} from './errors.js';
import {
	startOrder, stopOrder, transitiveDependencies, validateGraph,
} from './graph.js';
import {HealthMonitor} from './health.js';
import type {ServiceDriver, ServiceHandle} from './driver.js';
import type {
	DependencyRef, RunSummary, ServiceSpec, ServiceState, ServiceStatus,
} from './types.js';

export type SequencerOptions = {
	/** Delay before the first restart; doubles on each further restart. */
	restartDelayMs?: number;
	maxRestartDelayMs?: number;
};

type ManagedService = {
	spec: ServiceSpec;
	state: ServiceState;
	handle: ServiceHandle | null;
	monitor: HealthMonitor | null;
	// Start and stop operations on one service run one at a time through this chain
	queue: Promise<void>;
	stopRequested: boolean;
	restartTimer: NodeJS.Timeout | null;
	// Health failure waiting to be accounted for once the handle terminates
	failure: HealthCheckError | null;
};

/**
 * Brings services up in dependency order through a ServiceDriver.
 *
 * Each service waits for its dependencies' conditions (`started`, `healthy` or
 * `completed`) before the driver is asked to start it. Independent services start
 * concurrently. Failures are local to a service and go through its restart policy;
 * services waiting on a dependency that can no longer become ready end up `blocked`.
 */
export class Sequencer {
	private readonly services = new Map<string, ManagedService>();
	private readonly listeners = new Set<() => void>();
	private readonly scope = new Set<string>();
	private readonly restartDelayMs: number;
	private readonly maxRestartDelayMs: number;
	private shuttingDown = false;

	constructor(
		private readonly specs: readonly ServiceSpec[],
		private readonly driver: ServiceDriver,
		options: SequencerOptions = {},
	) {
		validateGraph(specs);

		this.restartDelayMs = options.restartDelayMs ?? 1000;
		this.maxRestartDelayMs = options.maxRestartDelayMs ?? 30000;

		for (const spec of specs) {
			this.services.set(spec.name, {
				spec,
				state: {status: 'pending', pid: null, restarts: 0},
				handle: null,
				monitor: null,
				queue: Promise.resolve(),
				stopRequested: false,
				restartTimer: null,
				failure: null,
			});
		}
	}

	/**
	 * Launch every service, or only `target` and what it depends on.
	 * Resolves once each of them has been started or given up on; use
	 * waitUntilSettled() to wait for health checks.
	 */
	async up(target?: string): Promise<void> {
		if (this.shuttingDown) {
			return;
		}

		let names = startOrder(this.specs);
		if (target !== undefined) {
			this.get(target);
			const needed = transitiveDependencies(this.specs, target);
			names = names.filter((name) => name === target || needed.has(name));
		}

		for (const name of names) {
			this.scope.add(name);
			this.get(name).stopRequested = false;
		}

		await Promise.all(names.map(async (name) => this.launch(name)));
	}

	/** Start one service (and anything it depends on) after a stop. */
	async start(name: string): Promise<void> {
		await this.up(name);
	}

	/** Stop one service, or every service in reverse dependency order. Stopped services are not restarted. */
	async stop(name?: string): Promise<void> {
		if (name !== undefined) {
			await this.stopService(this.get(name));
			return;
		}

		for (const serviceName of stopOrder(this.specs)) {
			await this.stopService(this.get(serviceName));
		}
	}

	async restart(name?: string): Promise<void> {
		await this.stop(name);
		await this.up(name);
	}

	/** Cancel pending restarts and health polls, then stop everything in reverse dependency order. */
	async shutdown(): Promise<void> {
		if (this.shuttingDown) {
			return;
		}

		this.shuttingDown = true;
		for (const managed of this.services.values()) {
			this.clearRestart(managed);
		}

		// Releases anything still waiting on a dependency
		this.notify();

		for (const name of stopOrder(this.specs)) {
			const managed = this.get(name);
			await this.enqueue(managed, async () => {
				if (managed.handle) {
					await this.stopHandle(managed, managed.handle);
				} else if (managed.state.status === 'pending' || managed.state.status === 'starting') {
					this.setStatus(managed, 'stopped');
				}
			});
		}
	}

	/** Snapshot of every service's state. */
	status(): Record<string, ServiceState> {
		const services: Record<string, ServiceState> = {};
		for (const [name, managed] of this.services) {
			services[name] = {...managed.state};
		}

		return services;
	}

	/** True once every launched service is up (healthy, where it has a check) or has been given up on. */
	isSettled(): boolean {
		for (const name of this.scope) {
			if (!this.isServiceSettled(this.get(name))) {
				return false;
			}
		}

		return true;
	}

	summary(): RunSummary {
		const ok = [...this.scope].every((name) => {
			const {status} = this.get(name).state;
			return status !== 'failed' && status !== 'blocked';
		});
		return {ok, services: this.status()};
	}

	async waitUntilSettled(): Promise<RunSummary> {
		await this.waitUntil(() => this.isSettled());
		return this.summary();
	}

	private get(name: string): ManagedService {
		const managed = this.services.get(name);
		if (!managed) {
			throw new ConfigurationError(`Unknown service: ${name}`);
		}

		return managed;
	}

	private async launch(name: string): Promise<void> {
		const managed = this.get(name);
		this.clearRestart(managed);
		if (managed.handle || this.shuttingDown) {
			return;
		}

		this.setStatus(managed, 'pending');

		try {
			await Promise.all(managed.spec.dependsOn.map(async (ref) => this.waitForDependency(name, ref)));
		} catch (err) {
			if (!(err instanceof DependencyBlockedError)) {
				throw err;
			}

			console.error(err.message);
			managed.state.lastError = err.message;
			this.setStatus(managed, 'blocked');
			return;
		}

		await this.enqueue(managed, async () => this.startProcess(managed));
	}

	private async startProcess(managed: ManagedService): Promise<void> {
		if (managed.handle || managed.stopRequested || this.shuttingDown) {
			return;
		}

		const {name, healthCheck} = managed.spec;
		managed.failure = null;
		this.setStatus(managed, 'starting');

		let handle: ServiceHandle;
		try {
			handle = await this.driver.start(managed.spec);
		} catch (err) {
			const error = new StartError(name, err);
			console.error(error.message);
			managed.state.lastError = error.message;
			this.afterTermination(managed, true);
			return;
		}

		managed.handle = handle;
		managed.state.pid = handle.pid;
		managed.state.exitCode = undefined;
		managed.state.startedAt = new Date().toISOString();
		console.log(`Started ${name}${handle.pid === null ? '' : ` (pid ${handle.pid})`}`);

		handle.exited.then((code) => {
			this.terminated(managed, handle, code);
		}, (err: unknown) => {
			console.error(`Lost track of ${name}: ${errorMessage(err)}`);
			this.terminated(managed, handle, null);
		});

		if (healthCheck) {
			const monitor = new HealthMonitor(
				name,
				healthCheck,
				async () => this.driver.runHealthCheck(handle, healthCheck.command, healthCheck.timeoutMs),
				{
					onHealthy: () => {
						if (managed.handle !== handle) {
							return;
						}

						managed.state.healthyAt = new Date().toISOString();
						console.log(`${name} is healthy`);
						this.setStatus(managed, 'healthy');
					},
					onUnhealthy: (error) => {
						this.unhealthy(managed, handle, error);
					},
				},
			);
			managed.monitor = monitor;
			monitor.start();
		}

		this.setStatus(managed, 'started');
	}

	private unhealthy(managed: ManagedService, handle: ServiceHandle, error: HealthCheckError): void {
		if (managed.handle !== handle) {
			return;
		}

		console.error(error.message);
		managed.failure = error;
		managed.state.lastError = error.message;
		this.enqueue(managed, async () => this.stopHandle(managed, handle)).catch((err: unknown) => {
			console.error(`Failed to stop unhealthy ${managed.spec.name}: ${errorMessage(err)}`);
		});
	}

	private async stopService(managed: ManagedService): Promise<void> {
		managed.stopRequested = true;
		this.clearRestart(managed);

		await this.enqueue(managed, async () => {
			if (managed.handle) {
				await this.stopHandle(managed, managed.handle);
			} else if (managed.state.status !== 'blocked' && managed.state.status !== 'stopped') {
				this.setStatus(managed, 'stopped');
			}
		});
	}

	private async stopHandle(managed: ManagedService, handle: ServiceHandle): Promise<void> {
		await managed.monitor?.stop();
		try {
			await this.driver.stop(handle);
		} catch (err) {
			console.error(`Failed to stop ${managed.spec.name}: ${errorMessage(err)}`);
			managed.state.lastError = errorMessage(err);
		}

		this.terminated(managed, handle, null);
	}

	// Runs once per handle, from whichever of exit or stop comes first
	private terminated(managed: ManagedService, handle: ServiceHandle, code: number | null): void {
		if (managed.handle !== handle) {
			return;
		}

		const {name} = managed.spec;
		managed.handle = null;
		managed.state.pid = null;
		managed.state.exitCode = code;
		if (managed.monitor) {
			void managed.monitor.stop();
			managed.monitor = null;
		}

		if (this.shuttingDown || managed.stopRequested) {
			console.log(`Stopped ${name}`);
			this.setStatus(managed, 'stopped');
			return;
		}

		const {failure} = managed;
		managed.failure = null;
		if (failure === null) {
			if (code === 0) {
				console.log(`${name} exited (code 0)`);
			} else {
				managed.state.lastError = code === null ? 'Killed by signal' : `Exit code ${code}`;
				console.error(`${name} exited (${managed.state.lastError})`);
			}
		}

		this.afterTermination(managed, failure !== null || code !== 0);
	}

	private afterTermination(managed: ManagedService, failed: boolean): void {
		const {name, restart} = managed.spec;
		const status: ServiceStatus = failed ? 'failed' : 'stopped';

		const wanted = restart.name === 'always'
			|| restart.name === 'unless-stopped'
			|| (restart.name === 'on-failure' && failed);
		if (!wanted || this.shuttingDown || managed.stopRequested) {
			this.setStatus(managed, status);
			return;
		}

		if (restart.maxRetries !== undefined && managed.state.restarts >= restart.maxRetries) {
			console.error(`${name} exceeded max restarts (${restart.maxRetries}), giving up`);
			this.setStatus(managed, status);
			return;
		}

		managed.state.restarts += 1;
		const delay = Math.min(this.restartDelayMs * (2 ** (managed.state.restarts - 1)), this.maxRestartDelayMs);
		console.log(`${name} ${status}, restarting in ${delay}ms (attempt ${managed.state.restarts})`);

		// Set before publishing the status so waiters see a restart is coming
		managed.restartTimer = setTimeout(() => {
			managed.restartTimer = null;
			this.launch(name).catch((err: unknown) => {
				console.error(`Failed to restart ${name}: ${errorMessage(err)}`);
			});
		}, delay);
		this.setStatus(managed, status);
	}

	private async waitForDependency(service: string, ref: DependencyRef): Promise<void> {
		const dependency = this.get(ref.service);
		return this.waitUntil(() => {
			if (this.shuttingDown || this.isConditionMet(dependency, ref)) {
				return true;
			}

			if (this.cannotBecomeReady(dependency)) {
				throw new DependencyBlockedError(service, ref.service);
			}

			return false;
		});
	}

	private isConditionMet({state}: ManagedService, ref: DependencyRef): boolean {
		switch (ref.condition) {
			case 'started':
				return state.status === 'started' || state.status === 'healthy';
			case 'healthy':
				return state.status === 'healthy';
			case 'completed':
				return state.status === 'stopped' && state.exitCode === 0;
		}
	}

	// Only called when the condition is unmet, so a clean exit here means it will never be met
	private cannotBecomeReady(managed: ManagedService): boolean {
		if (managed.restartTimer) {
			return false;
		}

		const {status} = managed.state;
		return status === 'failed' || status === 'blocked' || status === 'stopped';
	}

	private isServiceSettled(managed: ManagedService): boolean {
		if (managed.restartTimer) {
			return false;
		}

		switch (managed.state.status) {
			case 'pending':
			case 'starting':
				return false;
			case 'started':
				return !managed.spec.healthCheck;
			default:
				return true;
		}
	}

	/** Resolves once `predicate` returns true; rejects if it throws. Re-checked on every state change. */
	private async waitUntil(predicate: () => boolean): Promise<void> {
		return new Promise((resolve, reject) => {
			const check = (): boolean => {
				try {
					if (predicate()) {
						resolve();
						return true;
					}

					return false;
				} catch (err) {
					reject(err);
					return true;
				}
			};

			if (check()) {
				return;
			}

			const listener = () => {
				if (check()) {
					this.listeners.delete(listener);
				}
			};

			this.listeners.add(listener);
		});
	}

	private async enqueue(managed: ManagedService, operation: () => Promise<void>): Promise<void> {
		const run = managed.queue.then(operation);
		// The caller sees the failure; the chain itself must keep going
		managed.queue = run.catch(() => undefined);
		return run;
	}

	private clearRestart(managed: ManagedService): void {
		if (managed.restartTimer) {
			clearTimeout(managed.restartTimer);
			managed.restartTimer = null;
		}
	}

	private setStatus(managed: ManagedService, status: ServiceStatus): void {
		managed.state.status = status;
		this.notify();
	}

	private notify(): void {
		for (const listener of [...this.listeners]) {
			listener();
		}
	}
}
