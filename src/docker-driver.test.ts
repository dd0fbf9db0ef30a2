import {describe, expect, test} from 'vitest';
import {containerName, dockerExecArgs, dockerRunArgs} from './docker-driver.js';
import {makeSpec} from './testing/fake-driver.js';

describe('dockerRunArgs', () => {
	test('maps ports, environment, working_dir and entrypoint onto docker run', () => {
		const spec = makeSpec('api', {
			image: 'shop/api',
			ports: [
				{host: 8080, container: 80, protocol: 'tcp'},
				{
					hostIp: '127.0.0.1', host: 5353, container: 53, protocol: 'udp',
				},
			],
			environment: {LOG_LEVEL: 'debug'},
			workingDir: '/app',
			entrypoint: 'docker-entrypoint.sh --verbose',
			command: ['node', 'server.js'],
		});

		expect(dockerRunArgs(spec, 'shop-api')).toEqual([
			'run', '--rm', '--name', 'shop-api',
			'-p', '8080:80',
			'-p', '127.0.0.1:5353:53/udp',
			'-e', 'LOG_LEVEL=debug',
			'-w', '/app',
			'--entrypoint', 'docker-entrypoint.sh',
			'shop/api', '--verbose', 'node', 'server.js',
		]);
	});

	test('splits a string command into words after the image', () => {
		const spec = makeSpec('db', {image: 'postgres:16', platform: 'linux/amd64', command: 'postgres -c fsync=off'});
		expect(dockerRunArgs(spec, 'shop-db')).toEqual([
			'run', '--rm', '--name', 'shop-db', '--platform', 'linux/amd64', 'postgres:16', 'postgres', '-c', 'fsync=off',
		]);
	});

	test('needs an image', () => {
		expect(() => dockerRunArgs(makeSpec('db'), 'shop-db')).toThrow('db has no image');
	});
});

describe('containerName', () => {
	test('prefixes the project unless container_name is set', () => {
		expect(containerName(makeSpec('db'), 'shop')).toBe('shop-db');
		expect(containerName(makeSpec('db', {containerName: 'pg'}), 'shop')).toBe('pg');
	});
});

describe('dockerExecArgs', () => {
	test('runs exec checks directly and shell checks through sh -c', () => {
		expect(dockerExecArgs('shop-db', {kind: 'exec', argv: ['pg_isready', '-U', 'shop']}))
			.toEqual(['exec', 'shop-db', 'pg_isready', '-U', 'shop']);
		expect(dockerExecArgs('shop-db', {kind: 'shell', script: 'pg_isready || exit 1'}))
			.toEqual(['exec', 'shop-db', 'sh', '-c', 'pg_isready || exit 1']);
	});
});
