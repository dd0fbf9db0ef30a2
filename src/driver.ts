import type {HealthCommand, ServiceSpec} from './types.js';

export type ServiceHandle = {
	id: string;
	service: string;
	pid: number | null;
	/** Settles with the exit code (null when killed by a signal) once the service terminates. */
	exited: Promise<number | null>;
};

/**
 * The runtime that actually runs services. The sequencer only orders and gates
 * calls into it.
 */
export type ServiceDriver = {
	/** Rejects when the service cannot be launched. */
	start(spec: ServiceSpec): Promise<ServiceHandle>;
	/** Resolves once the service has terminated. */
	stop(handle: ServiceHandle): Promise<void>;
	runHealthCheck(handle: ServiceHandle, command: HealthCommand, timeoutMs: number): Promise<boolean>;
};
