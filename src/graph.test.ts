import {describe, expect, test} from 'vitest';
import {ConfigurationError} from './errors.js';
import {
	startLevels, startOrder, stopOrder, transitiveDependencies, validateGraph,
} from './graph.js';
import {makeHealthCheck, makeSpec} from './testing/fake-driver.js';
import type {DependencyRef, ServiceSpec} from './types.js';

const dependsOn = (...services: string[]): DependencyRef[] => services.map((service) => ({service, condition: 'started'}));

const composeLike: ServiceSpec[] = [
	makeSpec('web', {dependsOn: dependsOn('backend')}),
	makeSpec('db'),
	makeSpec('backend', {dependsOn: dependsOn('db', 'broker')}),
	makeSpec('worker', {dependsOn: dependsOn('backend', 'broker')}),
	makeSpec('broker'),
	makeSpec('beat', {dependsOn: dependsOn('worker')}),
];

describe('startLevels', () => {
	test('groups services so every dependency sits in an earlier level', () => {
		expect(startLevels(composeLike)).toEqual([
			['db', 'broker'],
			['backend'],
			['web', 'worker'],
			['beat'],
		]);
	});

	test('independent services share the first level in declaration order', () => {
		expect(startLevels([makeSpec('b'), makeSpec('a'), makeSpec('c')])).toEqual([['b', 'a', 'c']]);
	});

	test('start order puts every dependency first on generated graphs', () => {
		// Seeded so failures reproduce
		let seed = 7;
		const next = () => {
			seed = (seed * 16_807) % 2_147_483_647;
			return seed / 2_147_483_647;
		};

		for (let round = 0; round < 20; round++) {
			const count = 2 + Math.floor(next() * 10);
			const specs: ServiceSpec[] = [];
			for (let i = 0; i < count; i++) {
				const deps = Array.from({length: i}, (_, j) => `s${j}`).filter(() => next() < 0.3);
				specs.push(makeSpec(`s${i}`, {dependsOn: dependsOn(...deps)}));
			}

			specs.reverse();
			const order = startOrder(specs);
			expect(order).toHaveLength(count);
			for (const spec of specs) {
				for (const dep of spec.dependsOn) {
					expect(order.indexOf(dep.service)).toBeLessThan(order.indexOf(spec.name));
				}
			}
		}
	});

	test('stop order is start order reversed', () => {
		expect(stopOrder(composeLike)).toEqual([...startOrder(composeLike)].reverse());
		expect(stopOrder(composeLike)).toEqual(['beat', 'worker', 'web', 'backend', 'broker', 'db']);
	});
});

describe('validateGraph', () => {
	test('names the cycle path', () => {
		expect(() => validateGraph([
			makeSpec('a', {dependsOn: dependsOn('b')}),
			makeSpec('b', {dependsOn: dependsOn('a')}),
		])).toThrow('Circular dependency detected: a -> b -> a');
	});

	test('rejects a service depending on itself', () => {
		expect(() => validateGraph([makeSpec('a', {dependsOn: dependsOn('a')})]))
			.toThrow('Circular dependency detected: a -> a');
	});

	test('rejects undefined dependencies', () => {
		expect(() => validateGraph([makeSpec('web', {dependsOn: dependsOn('db')})]))
			.toThrow('Service web depends on undefined service db');
	});

	test('rejects duplicate names', () => {
		expect(() => validateGraph([makeSpec('db'), makeSpec('db')])).toThrow(new ConfigurationError('Duplicate service name: db'));
	});

	test('a healthy condition needs a healthcheck on the target', () => {
		const web = makeSpec('web', {dependsOn: [{service: 'db', condition: 'healthy'}]});
		expect(() => validateGraph([makeSpec('db'), web]))
			.toThrow('Service web waits for db to be healthy, but db has no healthcheck');
		expect(() => validateGraph([makeSpec('db', {healthCheck: makeHealthCheck()}), web])).not.toThrow();
	});
});

describe('transitiveDependencies', () => {
	test('follows dependencies all the way down', () => {
		expect([...transitiveDependencies(composeLike, 'beat')].sort()).toEqual(['backend', 'broker', 'db', 'worker']);
		expect(transitiveDependencies(composeLike, 'db').size).toBe(0);
	});
});
