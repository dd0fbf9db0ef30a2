import {formatDuration} from './duration.js';
import {startLevels} from './graph.js';
import type {
	CommandLine, Config, HealthCommand, ServiceSpec, ServiceState,
} from './types.js';

export function getStatusIcon(status: string): string {
	switch (status) {
		case 'healthy': return '●';
		case 'started': return '●';
		case 'starting': return '◐';
		case 'pending': return '○';
		case 'stopped': return '■';
		case 'failed': return '✗';
		case 'blocked': return '⊘';
		default: return '?';
	}
}

export function formatServiceTable(services: Record<string, ServiceState>): string[] {
	const entries = Object.entries(services);
	if (entries.length === 0) {
		return [];
	}

	const maxNameLen = Math.max(...entries.map(([n]) => n.length));
	return entries.map(([name, state]) => {
		const pid = state.pid ? `pid:${state.pid}` : '';
		const restarts = state.restarts > 0 ? `(${state.restarts} restarts)` : '';
		const error = state.lastError ? `[${state.lastError}]` : '';
		return `  ${getStatusIcon(state.status)} ${name.padEnd(maxNameLen)}  ${state.status.padEnd(8)} ${pid.padEnd(12)} ${restarts} ${error}`.trimEnd();
	});
}

const formatCommandLine = (line: CommandLine) => (typeof line === 'string' ? line : JSON.stringify(line));

const formatHealthCommand = (command: HealthCommand) =>
	(command.kind === 'exec' ? `CMD ${command.argv.join(' ')}` : `CMD-SHELL ${command.script}`);

export function describeService(spec: ServiceSpec): string[] {
	const lines = [`${spec.name}:`];
	if (spec.image) {
		lines.push(`  image: ${spec.image}`);
	}

	if (spec.platform) {
		lines.push(`  platform: ${spec.platform}`);
	}

	if (spec.entrypoint) {
		lines.push(`  entrypoint: ${formatCommandLine(spec.entrypoint)}`);
	}

	if (spec.command) {
		lines.push(`  command: ${formatCommandLine(spec.command)}`);
	}

	if (spec.ports.length > 0) {
		lines.push(`  ports: ${spec.ports.map((p) => `${p.hostIp ? `${p.hostIp}:` : ''}${p.host}->${p.container}/${p.protocol}`).join(', ')}`);
	}

	const restart = spec.restart.maxRetries === undefined ? spec.restart.name : `${spec.restart.name} (max ${spec.restart.maxRetries})`;
	lines.push(`  restart: ${restart}`);

	if (spec.envFiles.length > 0) {
		lines.push(`  env_file: ${spec.envFiles.join(', ')} (${Object.keys(spec.environment).length} variables)`);
	}

	if (spec.healthCheck) {
		const hc = spec.healthCheck;
		lines.push(`  healthcheck: ${formatHealthCommand(hc.command)} every ${formatDuration(hc.intervalMs)}, timeout ${formatDuration(hc.timeoutMs)}, ${hc.retries} retries, start period ${formatDuration(hc.startPeriodMs)}`);
	}

	if (spec.dependsOn.length > 0) {
		lines.push(`  depends_on: ${spec.dependsOn.map((dep) => `${dep.service} (${dep.condition})`).join(', ')}`);
	}

	return lines;
}

export function describeConfig(config: Config): string[] {
	const lines = [`Project: ${config.name} (${config.path})`, '', 'Start order:'];
	for (const [index, level] of startLevels(config.services).entries()) {
		lines.push(`  ${index + 1}. ${level.join(', ')}`);
	}

	lines.push('', 'Services:');
	for (const spec of config.services) {
		lines.push(...describeService(spec).map((line) => `  ${line}`));
	}

	return lines;
}
