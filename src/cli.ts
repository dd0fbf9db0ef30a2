#!/usr/bin/env node
/* eslint-disable no-await-in-loop */

import {spawn} from 'child_process';
import {
	existsSync, readFileSync, readdirSync, unlinkSync, mkdirSync, openSync,
} from 'fs';
import {join} from 'path';
import {
	loadConfig, getSocketPath, getStatusPath, getLogPath, getLogsDir, getStateDir,
} from './config.js';
import {startDaemon, type DriverName} from './daemon.js';
import {Client} from './client.js';
import {ConfigurationError} from './errors.js';
import {parseArgs} from './args.js';
import {parseDuration} from './duration.js';
import {describeConfig, formatServiceTable} from './format.js';
import {sleep} from './sleep.js';
import type {StatusFile} from './types.js';

const args = process.argv.slice(2);
const command = args[0];
const {positional, flags} = parseArgs(args.slice(1));

function stringFlag(name: string): string | undefined {
	const value = flags.get(name);
	return typeof value === 'string' ? value : undefined;
}

function driverFlag(): DriverName {
	const driver = stringFlag('--driver') ?? 'process';
	if (driver !== 'process' && driver !== 'docker') {
		throw new ConfigurationError(`Unknown driver: ${driver}. Expected process or docker`);
	}

	return driver;
}

async function main() {
	try {
		switch (command) {
			case 'up':
				await cmdUp();
				break;
			case 'down':
				await cmdDown();
				break;
			case 'status':
				await cmdStatus();
				break;
			case 'start':
				await cmdStart();
				break;
			case 'stop':
				await cmdStop();
				break;
			case 'restart':
				await cmdRestart();
				break;
			case 'logs':
				await cmdLogs();
				break;
			case 'config':
				await cmdConfig();
				break;
			case 'kill':
				await cmdKill();
				break;
			case 'help':
			case '--help':
			case '-h':
			case undefined:
				printHelp();
				break;
			default:
				console.error(`Unknown command: ${command}`);
				printHelp();
				process.exit(1);
		}
	} catch (err: unknown) {
		const prefix = err instanceof ConfigurationError ? 'Configuration error' : 'Error';
		console.error(`${prefix}: ${err instanceof Error ? err.message : String(err)}`);
		process.exit(1);
	}
}

async function cmdUp() {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		throw new Error('Could not determine script path');
	}

	// Validate in the foreground so a bad document fails before anything is launched
	const config = await loadConfig(process.cwd(), stringFlag('--file'));
	const serviceArg = positional[0];
	if (serviceArg && !config.services.some((svc) => svc.name === serviceArg)) {
		throw new ConfigurationError(`Unknown service: ${serviceArg}`);
	}

	const driver = driverFlag();
	const timeoutMs = parseDuration(stringFlag('--timeout') ?? '300s');
	if (timeoutMs <= 0) {
		throw new ConfigurationError(`Invalid --timeout: ${stringFlag('--timeout')}`);
	}

	const client = new Client();
	const socketPath = getSocketPath();

	if (client.socketExists()) {
		const alive = await client.isRunning();
		if (alive) {
			if (serviceArg) {
				const res = await client.start(serviceArg);
				if (!res.ok) {
					console.error(`Failed: ${res.error}`);
					process.exit(1);
				}

				console.log(`Starting ${serviceArg}`);
				return;
			}

			console.log('Daemon already running. Use "rollcall down" to stop it first.');
			return;
		}

		console.log('Cleaning up stale socket...');
		unlinkSync(socketPath);
	}

	const stateDir = getStateDir();
	mkdirSync(stateDir, {recursive: true});
	mkdirSync(getLogsDir(), {recursive: true});

	// Daemon output goes to a file so crashes can be debugged
	const logFd = openSync(join(stateDir, 'daemon.log'), 'a');

	const daemonArgs = [...process.execArgv, scriptPath, '_daemon', `--file=${config.path}`, `--driver=${driver}`];
	if (serviceArg) {
		daemonArgs.push(serviceArg);
	}

	const child = spawn(process.execPath, daemonArgs, {
		detached: true,
		stdio: ['ignore', logFd, logFd],
		cwd: process.cwd(),
	});
	child.unref();
	console.log(`Daemon started (pid ${child.pid})`);

	let ready = false;
	for (let i = 0; i < 20 && !ready; i++) {
		await sleep(250);
		ready = await client.isRunning();
	}

	if (!ready) {
		if (!client.socketExists()) {
			console.error('Daemon failed to start. Check .rollcall/daemon.log for errors.');
			process.exit(1);
		}

		console.log('Daemon starting... check "rollcall status"');
		return;
	}

	if (flags.has('--no-wait')) {
		console.log('Daemon ready');
		return;
	}

	const status = await waitForSettled(client, timeoutMs);
	if (status) {
		console.log();
		for (const line of formatServiceTable(status.services)) {
			console.log(line);
		}

		console.log();
	}

	if (!status?.settled) {
		console.error(`Timed out after ${timeoutMs / 1000}s waiting for services. Check "rollcall status".`);
		process.exit(1);
	}

	if (!status.ok) {
		console.error('Some services failed to come up. Check "rollcall logs".');
		process.exit(1);
	}

	console.log('All services up');
}

async function waitForSettled(client: Client, timeoutMs: number): Promise<StatusFile | null> {
	const deadline = Date.now() + timeoutMs;
	let status: StatusFile | null = null;
	while (Date.now() < deadline) {
		status = await client.status();
		if (status?.settled) {
			return status;
		}

		await sleep(500);
	}

	return status;
}

function isPidAlive(pid: number): boolean {
	try {
		process.kill(pid, 0); // Signal 0 doesn't kill, just checks if process exists
		return true;
	} catch {
		return false;
	}
}

type DaemonCheckResult = {
	isRunning: boolean;
	socketConnected: boolean;
	pid: number | null;
	status: StatusFile | null;
};

function readStatusFile(): StatusFile | null {
	const statusPath = getStatusPath();
	if (!existsSync(statusPath)) {
		return null;
	}

	try {
		return JSON.parse(readFileSync(statusPath, 'utf-8')) as StatusFile;
	} catch (err) {
		console.error(`Ignoring unreadable ${statusPath}: ${err instanceof Error ? err.message : String(err)}`);
		return null;
	}
}

async function checkDaemon(): Promise<DaemonCheckResult> {
	const client = new Client();

	if (await client.isRunning()) {
		const status = await client.status();
		return {
			isRunning: true,
			socketConnected: true,
			pid: status?.daemon?.pid ?? null,
			status,
		};
	}

	if (client.socketExists()) {
		unlinkSync(getSocketPath());
	}

	// Fall back to status file to check for orphan daemon process
	const status = readStatusFile();
	if (status?.daemon?.pid && isPidAlive(status.daemon.pid)) {
		return {
			isRunning: true,
			socketConnected: false,
			pid: status.daemon.pid,
			status,
		};
	}

	return {
		isRunning: false,
		socketConnected: false,
		pid: null,
		status: status ? {...status, daemon: null} : null,
	};
}

async function cmdDown() {
	const daemon = await checkDaemon();

	if (!daemon.isRunning) {
		console.log('Daemon not running');
		return;
	}

	if (daemon.socketConnected) {
		const client = new Client();
		const res = await client.down();
		if (!res.ok) {
			console.error(`Failed to stop daemon: ${res.error}`);
			process.exit(1);
		}

		console.log('Daemon stopping...');
		for (let i = 0; i < 60; i++) {
			await sleep(500);
			if (!existsSync(getSocketPath())) {
				console.log('Daemon stopped');
				return;
			}
		}

		console.error('Daemon is still shutting down. Check "rollcall status".');
		process.exit(1);
	}

	if (daemon.pid) {
		console.log(`Killing orphan daemon (pid ${daemon.pid})...`);
		process.kill(daemon.pid, 'SIGTERM');
		await sleep(1000);
		if (isPidAlive(daemon.pid)) {
			process.kill(daemon.pid, 'SIGKILL');
		}

		console.log('Daemon stopped');
	}
}

async function cmdStatus() {
	const daemon = await checkDaemon();

	if (!daemon.status) {
		console.log('No status available. Daemon not running.');
		return;
	}

	if (!daemon.socketConnected) {
		if (daemon.isRunning) {
			console.log('\n⚠️  Daemon running but socket not responding (use "rollcall down" to kill)\n');
		} else {
			console.log('\n⚠️  Status from cache (daemon not responding)\n');
		}
	}

	const {status} = daemon;

	console.log();
	if (status.daemon) {
		console.log(`Daemon: running (pid ${status.daemon.pid})`);
	} else {
		console.log('Daemon: not running');
	}

	console.log();

	const table = formatServiceTable(status.services);
	if (table.length === 0) {
		console.log('No services configured');
		return;
	}

	console.log('Services:');
	console.log('─'.repeat(60));
	for (const line of table) {
		console.log(line);
	}

	console.log();
}

async function cmdStart() {
	const service = positional[0];
	const client = new Client();

	if (!await client.isRunning()) {
		await cmdUp();
		return;
	}

	const res = await client.start(service);
	if (!res.ok) {
		console.error(`Failed: ${res.error}`);
		process.exit(1);
	}

	console.log(service ? `Starting ${service}` : 'Starting all services');
}

async function cmdStop() {
	const service = positional[0];
	const client = new Client();

	if (!await client.isRunning()) {
		console.log('Daemon not running');
		return;
	}

	const res = await client.stop(service);
	if (!res.ok) {
		console.error(`Failed: ${res.error}`);
		process.exit(1);
	}

	console.log(service ? `Stopped ${service}` : 'Stopped all services');
}

async function cmdRestart() {
	const service = positional[0];
	const client = new Client();

	// If daemon not running, start it
	if (!await client.isRunning()) {
		await cmdUp();
		return;
	}

	const res = await client.restart(service);
	if (!res.ok) {
		console.error(`Failed: ${res.error}`);
		process.exit(1);
	}

	console.log(service ? `Restarted ${service}` : 'Restarted all services');
}

async function cmdLogs() {
	const service = positional[0];
	const follow = flags.has('-f') || flags.has('--follow');
	const lines = [...flags.keys()].find((flag) => /^-n\d+$/.test(flag))?.slice(2) ?? '50';

	const timestamp = `=== Logs fetched at ${new Date().toISOString()} ===`;

	if (service) {
		const logPath = getLogPath(service);
		if (!existsSync(logPath)) {
			console.error(`No logs for ${service}`);
			process.exit(1);
		}

		if (follow) {
			console.log(timestamp);
			spawn('tail', ['-f', logPath], {stdio: 'inherit'});
			return;
		}

		const client = new Client();
		const fromDaemon = await client.isRunning() ? await client.logs(service, Number(lines)) : null;
		console.log(fromDaemon ?? readFileSync(logPath, 'utf-8').split('\n').slice(-Number(lines)).join('\n'));
		console.log(timestamp);
		return;
	}

	const logsDir = getLogsDir();
	if (!existsSync(logsDir)) {
		console.error('No logs directory found');
		process.exit(1);
	}

	const logFiles = readdirSync(logsDir)
		.filter((f) => f.endsWith('.log'))
		.map((f) => getLogPath(f.replace(/\.log$/, '')));

	if (logFiles.length === 0) {
		console.error('No log files found');
		process.exit(1);
	}

	if (follow) {
		console.log(timestamp);
		spawn('tail', ['-f', ...logFiles], {stdio: 'inherit'});
	} else {
		const proc = spawn('tail', [`-n${lines}`, ...logFiles], {stdio: 'inherit'});
		proc.on('close', () => {
			console.log(timestamp);
		});
	}
}

async function cmdConfig() {
	const config = await loadConfig(process.cwd(), stringFlag('--file'));
	for (const line of describeConfig(config)) {
		console.log(line);
	}
}

async function cmdKill() {
	console.log('Force killing all processes...');

	const client = new Client();
	if (await client.isRunning()) {
		await client.down().catch((err: unknown) => {
			console.error(`Graceful shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
		});
		await sleep(1000);
	}

	const socketPath = getSocketPath();
	if (existsSync(socketPath)) {
		unlinkSync(socketPath);
	}

	// Whatever the last status file recorded as running gets SIGKILL
	const status = readStatusFile();
	const pids: Array<[string, number]> = Object.entries(status?.services ?? {})
		.flatMap(([name, state]): Array<[string, number]> => (state.pid ? [[name, state.pid]] : []));
	if (status?.daemon?.pid) {
		pids.push(['daemon', status.daemon.pid]);
	}

	for (const [name, pid] of pids) {
		if (isPidAlive(pid)) {
			process.kill(pid, 'SIGKILL');
			console.log(`  Killed ${name} (pid ${pid})`);
		}
	}

	console.log('Done. Safe to run "rollcall up"');
}

function printHelp() {
	console.log(`
rollcall - Bring up services in dependency order

Usage: rollcall <command> [options]

Commands:
  up [service]       Start daemon and services (or one service and its dependencies)
                     --no-wait       return once the daemon is listening
                     --timeout=<dur> how long to wait for services (default 300s)
                     --driver=<name> process (default) or docker
  status             Show service status
  start [service]    Start a stopped service (or all)
  stop [service]     Stop a service (or all)
  restart [service]  Restart a service (or all)
  logs [service]     View logs (-f to follow, -n50 for line count)
  config             Show resolved services and start order
  down               Stop all services in reverse order, then the daemon
  kill               Force kill all processes (cleanup)

Options:
  --file=<path>      Service document (default: rollcall.yaml, compose.yaml, docker-compose.yml, ...)

Examples:
  rollcall config          Check the document and see the start order
  rollcall up              Start everything
  rollcall up web          Start just web (and its dependencies)
  rollcall logs api -f     Follow API logs
`);
}

// Internal command for daemonization
if (command === '_daemon') {
	process.title = 'rollcall-daemon';
	loadConfig(process.cwd(), stringFlag('--file'))
		.then(async (config) => startDaemon(config, process.cwd(), {onlyService: positional[0], driver: driverFlag()}))
		.catch((err: unknown) => {
			console.error(err);
			process.exit(1);
		});
} else {
	void main();
}
