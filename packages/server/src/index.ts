/**
 * @soulrelay/server — configuration, the relay session registry, the TCP
 * line transport and process wiring.
 *
 * @packageDocumentation
 */

export { RelayServer } from './relay-server';
export type { RelayServerOptions, StartupSummary } from './relay-server';

export { CONFIG_FILE_NAME, DEFAULT_CONFIG, envOverrides, findConfigFile, loadConfig, validateConfig } from './config';
export type { LoadConfigOptions, LoadedConfig, MatchPriority, ServerConfig } from './config';

export { LineServer, DEFAULT_MAX_LINE_LENGTH, ERR_LINE_TOO_LONG } from './line-server';
export type { LineServerOptions } from './line-server';

export { SessionRegistry, ERR_NICK_IN_USE, ERR_NOT_ON_CHANNEL, ERR_NO_SUCH_TARGET } from './session-registry';
export type { SessionRegistryOptions } from './session-registry';

export { RelaySession } from './session';
export type { LineSink } from './session';
