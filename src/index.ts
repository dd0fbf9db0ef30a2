// Public API
export type {
	Config, ServiceSpec, DependencyRef, DependencyCondition, HealthCheck, HealthCommand, PortMapping,
	RestartPolicy, ServiceState, ServiceStatus, RunSummary, StatusFile,
} from './types.js';
export {
	loadConfig, loadConfigFile, parseConfig, getStateDir, getSocketPath, getStatusPath, getLogsDir, getLogPath,
} from './config.js';
export {
	RollcallError, ConfigurationError, StartError, HealthCheckError, DependencyBlockedError,
} from './errors.js';
export {
	validateGraph, startLevels, startOrder, stopOrder,
} from './graph.js';
export type {ServiceDriver, ServiceHandle} from './driver.js';
export {ProcessDriver, type ProcessDriverOptions} from './process-driver.js';
export {DockerDriver, type DockerDriverOptions} from './docker-driver.js';
export {Sequencer, type SequencerOptions} from './sequencer.js';
export {Daemon, startDaemon, type DaemonOptions} from './daemon.js';
export {Client} from './client.js';
