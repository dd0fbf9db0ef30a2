export class RollcallError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'RollcallError';
	}
}

/** Invalid document, unknown service, dangling dependency or dependency cycle. */
export class ConfigurationError extends RollcallError {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}

/** The driver could not launch a service. */
export class StartError extends RollcallError {
	constructor(readonly service: string, cause: unknown) {
		super(`${service} failed to start: ${cause instanceof Error ? cause.message : String(cause)}`, {cause});
		this.name = 'StartError';
	}
}

export class HealthCheckError extends RollcallError {
	constructor(readonly service: string, readonly failures: number) {
		super(`${service} failed its health check ${failures} time${failures === 1 ? '' : 's'} in a row`);
		this.name = 'HealthCheckError';
	}
}

/** A dependency can no longer satisfy its condition. */
export class DependencyBlockedError extends RollcallError {
	constructor(readonly service: string, readonly dependency: string) {
		super(`${service} blocked: dependency ${dependency} cannot become ready`);
		this.name = 'DependencyBlockedError';
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
