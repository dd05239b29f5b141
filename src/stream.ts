/**
 * Transport selection: proxy command when one applies, plain TCP otherwise
 */

import * as net from 'net';
import { systemEnvironment, type HostEnvironment } from './environment.js';
import { createConnectionError } from './errors.js';
import { logger } from './logging.js';
import { launchProxyCommand, ProxyProcess, type LaunchOptions } from './proxy.js';
import { buildCommand, proxyCommandSpec } from './tokens.js';
import type { ResolvedConfig } from './types.js';

export type Transport = ProxyProcess | net.Socket;

export interface TransportOptions extends LaunchOptions {
  environment?: HostEnvironment;
  /** TCP connect timeout; defaults to the ConnectTimeout directive, else none */
  connectTimeoutMs?: number;
}

/**
 * Builds the expanded proxy command for a resolved host, if it has one
 */
export function resolveProxyCommand(resolved: ResolvedConfig, env: HostEnvironment = systemEnvironment): string | undefined {
  const spec = proxyCommandSpec(resolved);
  if (!spec) {
    return undefined;
  }
  return buildCommand(spec, resolved.hostName, resolved.port, resolved.user, {
    originalHost: resolved.host,
    localUser: env.localUser(),
    localHostName: env.localHostName(),
    homeDir: env.homeDir()
  });
}

function connectTimeout(resolved: ResolvedConfig, options: TransportOptions): number | undefined {
  if (options.connectTimeoutMs !== undefined) {
    return options.connectTimeoutMs;
  }
  const seconds = Number(resolved.options.connecttimeout);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

/**
 * Opens a TCP connection and resolves once it is established
 */
export function connectTcp(host: string, port: number, timeoutMs?: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });
    let timeout: NodeJS.Timeout | undefined;

    const fail = (message: string, cause?: unknown) => {
      clearTimeout(timeout);
      socket.destroy();
      reject(createConnectionError(message, 'Check that the host is reachable and SSH is listening on the port', { cause }));
    };

    if (timeoutMs !== undefined) {
      timeout = setTimeout(() => fail(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`), timeoutMs);
    }

    const onError = (error: Error) => fail(`Connection to ${host}:${port} failed: ${error.message}`, error);
    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timeout);
      socket.off('error', onError);
      logger.debug('TCP transport connected', { host, port });
      resolve(socket);
    });
  });
}

/**
 * Opens the byte stream an SSH client should speak over for this host
 */
export async function openTransport(resolved: ResolvedConfig, options: TransportOptions = {}): Promise<Transport> {
  const command = resolveProxyCommand(resolved, options.environment ?? systemEnvironment);
  if (command !== undefined) {
    return launchProxyCommand(command, options);
  }
  return connectTcp(resolved.hostName, resolved.port, connectTimeout(resolved, options));
}

/**
 * Shuts a transport down; proxy commands are waited on until reaped
 */
export async function closeTransport(transport: Transport): Promise<void> {
  if (transport instanceof ProxyProcess) {
    await transport.close();
    return;
  }
  transport.destroy();
}
