import {ConfigurationError} from './errors.js';
import type {ServiceSpec} from './types.js';

/**
 * Check that every dependency names a declared service and that the graph has no cycle.
 * Throws ConfigurationError naming the offending reference or the cycle path.
 */
export function validateGraph(specs: readonly ServiceSpec[]): void {
	const byName = new Map<string, ServiceSpec>();
	for (const spec of specs) {
		if (byName.has(spec.name)) {
			throw new ConfigurationError(`Duplicate service name: ${spec.name}`);
		}

		byName.set(spec.name, spec);
	}

	for (const spec of specs) {
		for (const dep of spec.dependsOn) {
			const target = byName.get(dep.service);
			if (!target) {
				throw new ConfigurationError(`Service ${spec.name} depends on undefined service ${dep.service}`);
			}

			if (dep.condition === 'healthy' && !target.healthCheck) {
				throw new ConfigurationError(`Service ${spec.name} waits for ${dep.service} to be healthy, but ${dep.service} has no healthcheck`);
			}
		}
	}

	const visited = new Set<string>();
	const stack: string[] = [];

	const visit = (name: string) => {
		if (visited.has(name)) {
			return;
		}

		const onStack = stack.indexOf(name);
		if (onStack !== -1) {
			const cycle = [...stack.slice(onStack), name];
			throw new ConfigurationError(`Circular dependency detected: ${cycle.join(' -> ')}`);
		}

		stack.push(name);
		for (const dep of byName.get(name)?.dependsOn ?? []) {
			visit(dep.service);
		}

		stack.pop();
		visited.add(name);
	};

	for (const spec of specs) {
		visit(spec.name);
	}
}

/**
 * Group services into levels: every service's dependencies sit in earlier levels.
 * Services in the same level may start concurrently. Declaration order is kept within a level.
 */
export function startLevels(specs: readonly ServiceSpec[]): string[][] {
	validateGraph(specs);

	const placed = new Set<string>();
	let remaining = [...specs];
	const levels: string[][] = [];

	while (remaining.length > 0) {
		const ready = remaining.filter((spec) => spec.dependsOn.every((dep) => placed.has(dep.service)));
		for (const spec of ready) {
			placed.add(spec.name);
		}

		levels.push(ready.map((spec) => spec.name));
		remaining = remaining.filter((spec) => !placed.has(spec.name));
	}

	return levels;
}

export function startOrder(specs: readonly ServiceSpec[]): string[] {
	return startLevels(specs).flat();
}

export function stopOrder(specs: readonly ServiceSpec[]): string[] {
	return startOrder(specs).reverse();
}

/** Names `name` depends on, directly or transitively. */
export function transitiveDependencies(specs: readonly ServiceSpec[], name: string): Set<string> {
	const byName = new Map(specs.map((spec) => [spec.name, spec]));
	const result = new Set<string>();
	const visit = (n: string) => {
		for (const dep of byName.get(n)?.dependsOn ?? []) {
			if (!result.has(dep.service)) {
				result.add(dep.service);
				visit(dep.service);
			}
		}
	};

	visit(name);
	return result;
}
