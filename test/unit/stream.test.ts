import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import * as net from 'net';
import { closeTransport, connectTcp, openTransport, resolveProxyCommand } from '../../src/stream.js';
import { ProxyProcess } from '../../src/proxy.js';
import { fixedEnvironment } from '../../src/environment.js';
import { ErrorCode, type ResolvedConfig } from '../../src/types.js';

const environment = fixedEnvironment({ homeDir: '/home/tester', localUser: 'tester', localHostName: 'workstation' });

function resolvedWith(overrides: Partial<ResolvedConfig>): ResolvedConfig {
  return {
    host: 'web',
    hostName: '127.0.0.1',
    port: 22,
    user: 'alice',
    identityFiles: [],
    certificateFiles: [],
    options: {},
    matched: true,
    ...overrides
  };
}

function listeningPort(server: net.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on TCP');
  }
  return address.port;
}

function firstChunk(stream: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    stream.once('data', (chunk: Buffer | string) => resolve(chunk.toString()));
    stream.once('error', reject);
  });
}

describe('Transport selection', () => {
  let server: net.Server;
  let port: number;

  beforeEach(async () => {
    // Stand-in SSH server: sends a banner, then echoes
    server = net.createServer(socket => {
      socket.on('error', () => socket.destroy());
      socket.write('SSH-2.0-TestServer\r\n');
      socket.pipe(socket);
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    port = listeningPort(server);
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  test('should connect over TCP when no proxy applies', async () => {
    const transport = await openTransport(resolvedWith({ port }), { environment });

    expect(transport).toBeInstanceOf(net.Socket);
    expect(await firstChunk(transport)).toBe('SSH-2.0-TestServer\r\n');
    await closeTransport(transport);
    expect(transport.destroyed).toBe(true);
  });

  test('should fail with a connection error when nothing listens', async () => {
    const closed = net.createServer();
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', () => resolve()));
    const unusedPort = listeningPort(closed);
    await new Promise<void>(resolve => closed.close(() => resolve()));

    await expect(connectTcp('127.0.0.1', unusedPort)).rejects.toMatchObject({ code: ErrorCode.ECONN });
  });

  test('should launch the proxy command with tokens expanded', async () => {
    const resolved = resolvedWith({ hostName: 'web.internal', port: 2222, proxyCommand: 'echo %r@%h:%p via %n' });
    expect(resolveProxyCommand(resolved, environment)).toBe('echo alice@web.internal:2222 via web');

    const transport = await openTransport(resolved, { environment });
    expect(transport).toBeInstanceOf(ProxyProcess);
    expect(await firstChunk(transport)).toBe('alice@web.internal:2222 via web\n');
    await closeTransport(transport);
  });

  test('should derive the proxy command from ProxyJump', () => {
    const resolved = resolvedWith({ hostName: 'db.internal', port: 5022, proxyJump: 'ops@bastion' });
    expect(resolveProxyCommand(resolved, environment)).toBe('ssh -l ops -W db.internal:5022 bastion');
  });

  test('should return undefined when the host connects directly', () => {
    expect(resolveProxyCommand(resolvedWith({}), environment)).toBeUndefined();
  });
});
