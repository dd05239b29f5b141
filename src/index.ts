/**
 * ssh-proxy-config
 *
 * Parses OpenSSH client config files and launches ProxyCommand transports
 * for SSH clients.
 */

export {
  DEFAULT_MAX_INCLUDE_DEPTH,
  emptyConfig,
  listHostAliases,
  loadUserConfig,
  parseConfig,
  parseConfigFile,
  splitArguments
} from './ssh-config.js';
export type { ParseOptions } from './ssh-config.js';
export { DEFAULT_SSH_PORT, resolveHost, resolveUserHost } from './resolve.js';
export type { ResolveOptions } from './resolve.js';
export { matchPattern, matchPatternList } from './patterns.js';
export { buildCommand, expandTokens, proxyCommandSpec, proxyJumpCommand } from './tokens.js';
export type { ExtraTokens, TokenValues } from './tokens.js';
export { DEFAULT_KILL_TIMEOUT_MS, launchProxyCommand, ProxyProcess } from './proxy.js';
export type { LaunchOptions } from './proxy.js';
export { closeTransport, connectTcp, openTransport, resolveProxyCommand } from './stream.js';
export type { Transport, TransportOptions } from './stream.js';
export { connectHost } from './connect.js';
export type { ConnectDependencies, ConnectedHost } from './connect.js';
export { expandTilde, fixedEnvironment, systemEnvironment } from './environment.js';
export type { HostEnvironment } from './environment.js';
export { Logger, LogLevel, logger, parseLogLevel } from './logging.js';
export { ErrorCode, SSHConfigError } from './types.js';
export type {
  ConfigFile,
  ConnectOptions,
  Directive,
  ErrorDetails,
  MatchCondition,
  ProxyCommandSpec,
  ProxyExit,
  ProxyState,
  ResolvedConfig,
  Stanza,
  StanzaCriteria
} from './types.js';
