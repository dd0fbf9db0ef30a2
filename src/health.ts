import {HealthCheckError} from './errors.js';
import {sleep} from './sleep.js';
import type {HealthCheck} from './types.js';

export type HealthProbe = () => Promise<boolean>;

export type HealthListener = {
	onHealthy: () => void;
	onUnhealthy: (error: HealthCheckError) => void;
};

/**
 * Polls one service's health check on a fixed interval.
 *
 * Waits out the start period, then probes immediately and every `intervalMs` after.
 * The first success reports healthy; `retries` consecutive failures report unhealthy
 * and end the loop. Polling carries on after the service turns healthy.
 */
export class HealthMonitor {
	private readonly controller = new AbortController();
	private loop: Promise<void> | null = null;

	constructor(
		private readonly service: string,
		private readonly check: HealthCheck,
		private readonly probe: HealthProbe,
		private readonly listener: HealthListener,
	) {}

	start(): void {
		this.loop ??= this.run().catch((err: unknown) => {
			console.error(`Health monitor for ${this.service} crashed:`, err);
		});
	}

	/** Stops polling. Resolves once any probe in flight has returned. */
	async stop(): Promise<void> {
		this.controller.abort();
		await this.loop;
	}

	private async run(): Promise<void> {
		const {signal} = this.controller;
		const retries = Math.max(1, this.check.retries);
		let failures = 0;
		let healthy = false;

		await sleep(this.check.startPeriodMs, signal);

		while (!signal.aborted) {
			const ok = await this.probeOnce(signal);
			if (signal.aborted) {
				return;
			}

			if (ok) {
				failures = 0;
				if (!healthy) {
					healthy = true;
					this.listener.onHealthy();
				}
			} else {
				failures += 1;
				if (failures >= retries) {
					this.controller.abort();
					this.listener.onUnhealthy(new HealthCheckError(this.service, failures));
					return;
				}
			}

			await sleep(this.check.intervalMs, signal);
		}
	}

	// A probe that throws or outlives its timeout counts as a failure; stopping abandons it
	private async probeOnce(signal: AbortSignal): Promise<boolean> {
		let cutOff: () => void = () => undefined;
		const cut = new Promise<boolean>((resolve) => {
			cutOff = () => {
				resolve(false);
			};
		});
		const timer = setTimeout(cutOff, this.check.timeoutMs);
		signal.addEventListener('abort', cutOff, {once: true});

		try {
			return await Promise.race([this.probe().catch(() => false), cut]);
		} finally {
			clearTimeout(timer);
			signal.removeEventListener('abort', cutOff);
		}
	}
}
