import {
	afterEach, beforeEach, describe, expect, test,
} from 'vitest';
import {mkdtemp, rm, writeFile} from 'fs/promises';
import {tmpdir} from 'os';
import {basename, join} from 'path';
import {
	loadConfig, parseConfig, parsePort, parseRestartPolicy,
} from './config.js';
import {ConfigurationError} from './errors.js';

const yaml = (...lines: string[]) => lines.join('\n');

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), 'rollcall-config-'));
});

afterEach(async () => {
	await rm(dir, {recursive: true, force: true});
});

describe('parseConfig', () => {
	test('reads a compose-style document', async () => {
		await writeFile(join(dir, '.env'), 'DB_PASSWORD=test-secret\nPOSTGRES_USER=ignored\n');
		const config = parseConfig(yaml(
			'name: shop',
			'services:',
			'  db:',
			'    image: postgres:16',
			'    env_file: .env',
			'    environment:',
			'      POSTGRES_USER: shop',
			'    healthcheck:',
			'      test: ["CMD", "pg_isready", "-U", "shop"]',
			'      interval: 5s',
			'      timeout: 2s',
			'      retries: 5',
			'      start_period: 1m',
			'    volumes:',
			'      - data:/var/lib/postgresql/data',
			'  api:',
			'    image: shop/api',
			'    command: ["node", "server.js"]',
			'    ports:',
			'      - "8080:80"',
			'      - 9000',
			'      - "127.0.0.1:5353:53/udp"',
			'    restart: on-failure:3',
			'    environment:',
			'      - LOG_LEVEL=debug',
			'      - HOME_DIR',
			'    depends_on:',
			'      db:',
			'        condition: service_healthy',
			'  worker:',
			'    image: shop/api',
			'    command: node worker.js',
			'    restart: unless-stopped',
			'    depends_on:',
			'      - api',
		), {baseDir: dir, path: join(dir, 'compose.yaml'), hostEnv: {HOME_DIR: '/home/test'}});

		expect(config.name).toBe('shop');
		expect(config.path).toBe(join(dir, 'compose.yaml'));
		expect(config.services.map((spec) => spec.name)).toEqual(['db', 'api', 'worker']);

		const [db, api, worker] = config.services;
		expect(db).toMatchObject({
			image: 'postgres:16',
			envFiles: ['.env'],
			environment: {DB_PASSWORD: 'test-secret', POSTGRES_USER: 'shop'},
			restart: {name: 'never'},
			dependsOn: [],
		});
		expect(db?.healthCheck).toEqual({
			command: {kind: 'exec', argv: ['pg_isready', '-U', 'shop']},
			intervalMs: 5000,
			timeoutMs: 2000,
			retries: 5,
			startPeriodMs: 60_000,
		});

		expect(api?.command).toEqual(['node', 'server.js']);
		expect(api?.ports).toEqual([
			{host: 8080, container: 80, protocol: 'tcp'},
			{host: 9000, container: 9000, protocol: 'tcp'},
			{
				hostIp: '127.0.0.1', host: 5353, container: 53, protocol: 'udp',
			},
		]);
		expect(api?.restart).toEqual({name: 'on-failure', maxRetries: 3});
		expect(api?.environment).toEqual({LOG_LEVEL: 'debug', HOME_DIR: '/home/test'});
		expect(api?.dependsOn).toEqual([{service: 'db', condition: 'healthy'}]);

		expect(worker).toMatchObject({
			command: 'node worker.js',
			restart: {name: 'unless-stopped'},
			dependsOn: [{service: 'api', condition: 'started'}],
		});
	});

	test('later env files override earlier ones and environment overrides both', async () => {
		await writeFile(join(dir, 'a.env'), 'A=1\nB=1\n');
		await writeFile(join(dir, 'b.env'), 'B=2\nC=2\n');
		const config = parseConfig(yaml(
			'services:',
			'  app:',
			'    command: ["true"]',
			'    env_file: [a.env, b.env]',
			'    environment:',
			'      C: 3',
			'      DEBUG: true',
		), {baseDir: dir});

		const environment = config.services[0]?.environment;
		expect(environment).toEqual({
			A: '1', B: '2', C: '3', DEBUG: 'true',
		});
		expect(Object.isFrozen(environment)).toBe(true);
	});

	test('an environment key without a value comes from the host', () => {
		const config = parseConfig(yaml(
			'services:',
			'  app:',
			'    environment:',
			'      TOKEN:',
			'      MISSING:',
		), {baseDir: '/srv/shop', hostEnv: {TOKEN: 'test-secret'}});

		expect(config.services[0]?.environment).toEqual({TOKEN: 'test-secret'});
	});

	test('defaults the project name to the directory and resolves working_dir', () => {
		const config = parseConfig(yaml(
			'services:',
			'  app:',
			'    working_dir: ./app',
			'  cache:',
		), {baseDir: '/srv/shop'});

		expect(config.name).toBe('shop');
		expect(config.path).toBe('/srv/shop');
		expect(config.services[0]?.workingDir).toBe('/srv/shop/app');
		expect(config.services[1]).toEqual({
			name: 'cache',
			image: undefined,
			containerName: undefined,
			platform: undefined,
			entrypoint: undefined,
			command: undefined,
			workingDir: undefined,
			ports: [],
			envFiles: [],
			environment: {},
			restart: {name: 'never'},
			healthCheck: undefined,
			dependsOn: [],
		});
	});

	test('reads every depends_on form', () => {
		const config = parseConfig(yaml(
			'services:',
			'  db:',
			'    healthcheck:',
			'      test: pg_isready',
			'  migrate:',
			'    depends_on: [db]',
			'  api:',
			'    depends_on:',
			'      db:',
			'        condition: service_healthy',
			'      migrate:',
			'        condition: service_completed_successfully',
			'  web:',
			'    depends_on:',
			'      api:',
		), {baseDir: dir});

		const [db, migrate, api, web] = config.services;
		expect(db?.healthCheck?.command).toEqual({kind: 'shell', script: 'pg_isready'});
		expect(migrate?.dependsOn).toEqual([{service: 'db', condition: 'started'}]);
		expect(api?.dependsOn).toEqual([
			{service: 'db', condition: 'healthy'},
			{service: 'migrate', condition: 'completed'},
		]);
		expect(web?.dependsOn).toEqual([{service: 'api', condition: 'started'}]);
	});

	test('reads healthcheck test forms and defaults', () => {
		const config = parseConfig(yaml(
			'services:',
			'  a:',
			'    healthcheck:',
			'      test: ["CMD-SHELL", "curl -f http://localhost/ || exit 1"]',
			'  b:',
			'    healthcheck:',
			'      test: ["NONE"]',
			'  c:',
			'    healthcheck:',
			'      test: ["CMD", "true"]',
			'      disable: true',
		), {baseDir: dir});

		const [a, b, c] = config.services;
		expect(a?.healthCheck).toEqual({
			command: {kind: 'shell', script: 'curl -f http://localhost/ || exit 1'},
			intervalMs: 30_000,
			timeoutMs: 30_000,
			retries: 3,
			startPeriodMs: 0,
		});
		expect(b?.healthCheck).toBeUndefined();
		expect(c?.healthCheck).toBeUndefined();
	});

	test('a zero interval or timeout falls back to the default', () => {
		const config = parseConfig(yaml(
			'services:',
			'  db:',
			'    healthcheck:',
			'      test: ["CMD", "true"]',
			'      interval: 0s',
			'      timeout: 0',
		), {baseDir: dir});

		expect(config.services[0]?.healthCheck).toMatchObject({intervalMs: 30_000, timeoutMs: 30_000});
	});
});

describe('parseConfig errors', () => {
	const parse = (...lines: string[]) => () => parseConfig(yaml(...lines), {baseDir: dir});

	test('rejects a dependency cycle', () => {
		expect(parse(
			'services:',
			'  a:',
			'    depends_on: [b]',
			'  b:',
			'    depends_on: [a]',
		)).toThrow(new ConfigurationError('Circular dependency detected: a -> b -> a'));
	});

	test('rejects an unknown restart policy', () => {
		expect(parse(
			'services:',
			'  web:',
			'    restart: sometimes',
		)).toThrow('services.web: Invalid restart policy: sometimes. Expected no, always, unless-stopped or on-failure[:max]');
	});

	test('rejects a missing env_file', () => {
		expect(parse(
			'services:',
			'  web:',
			'    env_file: missing.env',
		)).toThrow(/^services\.web: cannot read env_file missing\.env: /);
	});

	test('rejects a healthcheck test without a known prefix', () => {
		expect(parse(
			'services:',
			'  db:',
			'    healthcheck:',
			'      test: ["FOO", "x"]',
		)).toThrow('services.db: healthcheck.test must start with NONE, CMD or CMD-SHELL followed by a command');
	});

	test('names the path of a schema violation', () => {
		expect(parse(
			'services:',
			'  web:',
			'    ports: "8080"',
		)).toThrow(/^Invalid service document <inline>:\n {2}services\.web\.ports: /);
	});

	test('rejects a document without services', () => {
		expect(parse('name: shop')).toThrow(/^Invalid service document <inline>:\n {2}services: /);
	});

	test('rejects invalid YAML', () => {
		expect(parse('services: [')).toThrow(/^Invalid YAML in <inline>: /);
	});

	test('rejects an invalid service name', () => {
		expect(parse(
			'services:',
			'  "bad name":',
			'    command: ["true"]',
		)).toThrow('Invalid service name: bad name');
	});
});

describe('parsePort', () => {
	test.each([
		[80, {host: 80, container: 80, protocol: 'tcp'}],
		['80', {host: 80, container: 80, protocol: 'tcp'}],
		['8080:80/udp', {host: 8080, container: 80, protocol: 'udp'}],
		['0.0.0.0:8080:80/tcp', {
			hostIp: '0.0.0.0', host: 8080, container: 80, protocol: 'tcp',
		}],
	])('%j', (input, expected) => {
		expect(parsePort(input)).toEqual(expected);
	});

	test('rejects malformed mappings', () => {
		expect(() => parsePort('1:2:3:4')).toThrow('Invalid port mapping: 1:2:3:4');
		expect(() => parsePort('99999')).toThrow('Invalid port mapping: 99999');
		expect(() => parsePort('web')).toThrow('Invalid port mapping: web');
		expect(() => parsePort('80/sctp')).toThrow('Invalid port protocol in 80/sctp');
	});
});

describe('parseRestartPolicy', () => {
	test.each([
		[undefined, {name: 'never'}],
		[false, {name: 'never'}],
		['no', {name: 'never'}],
		['never', {name: 'never'}],
		['always', {name: 'always'}],
		['unless-stopped', {name: 'unless-stopped'}],
		['on-failure', {name: 'on-failure'}],
		['on-failure:5', {name: 'on-failure', maxRetries: 5}],
	] as const)('%j', (input, expected) => {
		expect(parseRestartPolicy(input)).toEqual(expected);
	});

	test('rejects anything else', () => {
		expect(() => parseRestartPolicy('on-failure:x')).toThrow(ConfigurationError);
	});
});

describe('loadConfig', () => {
	test('finds compose.yaml in the project directory', async () => {
		await writeFile(join(dir, 'compose.yaml'), yaml('services:', '  app:', '    command: ["true"]', ''));
		const config = await loadConfig(dir);

		expect(config.path).toBe(join(dir, 'compose.yaml'));
		expect(config.name).toBe(basename(dir));
		expect(config.services.map((spec) => spec.name)).toEqual(['app']);
	});

	test('prefers rollcall.yaml over compose files', async () => {
		await writeFile(join(dir, 'compose.yaml'), yaml('services:', '  a:', ''));
		await writeFile(join(dir, 'rollcall.yaml'), yaml('services:', '  b:', ''));

		const config = await loadConfig(dir);
		expect(config.services.map((spec) => spec.name)).toEqual(['b']);
	});

	test('loads an explicit file', async () => {
		await writeFile(join(dir, 'stack.yml'), yaml('services:', '  c:', ''));
		const config = await loadConfig(dir, 'stack.yml');
		expect(config.path).toBe(join(dir, 'stack.yml'));
	});

	test('fails when no document exists', async () => {
		await expect(loadConfig(dir)).rejects.toThrow(
			'No service document found. Create one of: rollcall.yaml, rollcall.yml, compose.yaml, compose.yml, docker-compose.yaml, docker-compose.yml',
		);
	});
});
