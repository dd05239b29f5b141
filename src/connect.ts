/**
 * Connects a node-ssh client to a config-resolved host, running the SSH
 * protocol over the proxy command (or TCP) transport.
 */

import * as fs from 'fs';
import { NodeSSH } from 'node-ssh';
import { systemEnvironment, type HostEnvironment } from './environment.js';
import { createBadRequestError, createConnectionError, wrapError } from './errors.js';
import { createTimer, logger } from './logging.js';
import { ProxyProcess } from './proxy.js';
import { resolveHost } from './resolve.js';
import { loadUserConfig } from './ssh-config.js';
import { closeTransport, openTransport, type Transport, type TransportOptions } from './stream.js';
import {
  ConnectOptionsSchema,
  ErrorCode,
  type ConfigFile,
  type ConnectOptions,
  type ResolvedConfig
} from './types.js';

type SSHConnectConfig = Parameters<NodeSSH['connect']>[0];

export interface ConnectDependencies {
  /** Parsed config to resolve against; defaults to the user's config */
  config?: ConfigFile;
  environment?: HostEnvironment;
  /** Client to connect; a fresh NodeSSH when omitted */
  client?: NodeSSH;
  transport?: Omit<TransportOptions, 'environment'>;
}

export interface ConnectedHost {
  ssh: NodeSSH;
  resolved: ResolvedConfig;
  transport: Transport;
  /** Disposes the client and reaps the transport */
  close(): Promise<void>;
}

function firstExistingIdentity(paths: string[]): string | undefined {
  return paths.find(candidate => fs.existsSync(candidate));
}

function mapConnectError(error: unknown, resolved: ResolvedConfig) {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('authentication')) {
      return createConnectionError(
        'SSH authentication failed',
        'Check your username, password, or IdentityFile configuration',
        { cause: error }
      );
    }
    if (message.includes('timed out') || message.includes('timeout')) {
      return createConnectionError(
        `SSH handshake with ${resolved.host} timed out`,
        'Check that the ProxyCommand reaches an SSH server',
        { cause: error }
      );
    }
  }
  return wrapError(error, ErrorCode.ECONN, 'Verify the host, port, and proxy configuration');
}

/**
 * Resolves a host alias and opens an SSH session over its transport
 */
export async function connectHost(options: ConnectOptions, deps: ConnectDependencies = {}): Promise<ConnectedHost> {
  const parsed = ConnectOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createBadRequestError(`Invalid connection option ${issue.path.join('.')}: ${issue.message}`);
  }
  const params = parsed.data;
  const environment = deps.environment ?? systemEnvironment;

  const config = deps.config ?? await loadUserConfig({ environment });
  const base = resolveHost(config, params.host, {
    environment,
    requireMatch: params.requireMatch,
    user: params.username
  });
  const resolved: ResolvedConfig = params.port === undefined ? base : { ...base, port: params.port };

  logger.debug('Opening SSH connection', {
    host: resolved.host,
    hostName: resolved.hostName,
    port: resolved.port,
    username: resolved.user
  });

  const timer = createTimer();
  const transport = await openTransport(resolved, { ...deps.transport, environment });
  const ssh = deps.client ?? new NodeSSH();

  const connectConfig: SSHConnectConfig = {
    sock: transport,
    host: resolved.hostName,
    port: resolved.port,
    username: resolved.user,
    password: params.password,
    privateKeyPath: params.privateKeyPath ?? firstExistingIdentity(resolved.identityFiles),
    passphrase: params.passphrase,
    readyTimeout: params.readyTimeoutMs
  };

  try {
    await ssh.connect(connectConfig);
  } catch (error) {
    logger.error('Failed to open SSH connection', { host: resolved.host, error });
    ssh.dispose();
    await closeTransport(transport);
    throw mapConnectError(error, resolved);
  }

  logger.info('SSH connection opened', {
    host: resolved.host,
    hostName: resolved.hostName,
    proxied: transport instanceof ProxyProcess,
    durationMs: timer.elapsed()
  });

  return {
    ssh,
    resolved,
    transport,
    close: async () => {
      ssh.dispose();
      await closeTransport(transport);
    }
  };
}
