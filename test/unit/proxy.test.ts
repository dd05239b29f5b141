import { describe, test, expect } from '@jest/globals';
import type { Readable } from 'stream';
import { launchProxyCommand } from '../../src/proxy.js';
import { ErrorCode } from '../../src/types.js';

function readAll(stream: Readable): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.once('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    stream.once('error', reject);
  });
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('ProxyProcess', () => {
  test('should relay bytes through the child and reach EOF when stdout closes', async () => {
    const proxy = await launchProxyCommand('cat');
    expect(proxy.state).toBe('running');
    expect(proxy.pid).toEqual(expect.any(Number));

    const received = readAll(proxy);
    proxy.write('hello ');
    proxy.end('proxy');

    expect(await received).toBe('hello proxy');
    expect(await proxy.wait()).toEqual({ code: 0, signal: null });
    expect(proxy.state).toBe('reaped');
  });

  test('should run shell syntax such as pipes', async () => {
    const proxy = await launchProxyCommand('tr a-z A-Z | cat');
    const received = readAll(proxy);
    proxy.end('shout');
    expect(await received).toBe('SHOUT');
  });

  test('should report the exit status of a command that exits on its own', async () => {
    const proxy = await launchProxyCommand('exit 3');
    expect(await readAll(proxy)).toBe('');
    expect(await proxy.wait()).toEqual({ code: 3, signal: null });
    expect(proxy.exitStatus).toEqual({ code: 3, signal: null });
  });

  test('should surface a missing command as a spawn error with its exit status', async () => {
    const proxy = await launchProxyCommand('ssh-proxy-config-no-such-command 2>/dev/null');
    const failure = new Promise(resolve => proxy.once('error', resolve));
    proxy.resume();

    await expect(failure).resolves.toMatchObject({
      code: ErrorCode.ESPAWN,
      details: { exitCode: 127 }
    });
  });

  test('should reach EOF when stdout closes while the child keeps running', async () => {
    const proxy = await launchProxyCommand('exec 1>&-; exec sleep 3');
    const started = Date.now();

    expect(await readAll(proxy)).toBe('');
    expect(Date.now() - started).toBeLessThan(1500);
    expect(proxy.state).toBe('closed');

    proxy.destroy();
    expect(await proxy.wait()).toEqual({ code: null, signal: 'SIGTERM' });
  });

  test('should fail with a spawn error when the shell cannot be started', async () => {
    await expect(launchProxyCommand('cat', { shell: '/nonexistent/shell' })).rejects.toMatchObject({
      code: ErrorCode.ESPAWN
    });
  });

  test('should surface writes to a closed pipe as an I/O error', async () => {
    const proxy = await launchProxyCommand('exec 0<&-; exec sleep 5', { killTimeoutMs: 100 });
    await delay(200);

    const failure = new Promise(resolve => proxy.once('error', resolve));
    proxy.write(Buffer.alloc(1024));

    await expect(failure).resolves.toMatchObject({ code: ErrorCode.EIO });
    const exit = await proxy.wait();
    expect(exit.signal).toBe('SIGTERM');
  });

  test('should close gracefully by ending stdin', async () => {
    const proxy = await launchProxyCommand('cat');
    proxy.resume();
    expect(await proxy.close()).toEqual({ code: 0, signal: null });
    expect(proxy.state).toBe('reaped');
    expect(proxy.destroyed).toBe(true);
  });

  test('should escalate to SIGKILL when the child ignores stdin and SIGTERM', async () => {
    const proxy = await launchProxyCommand("trap '' TERM; while :; do sleep 0.05; done", { killTimeoutMs: 100 });
    proxy.resume();
    expect(await proxy.close()).toEqual({ code: null, signal: 'SIGKILL' });
  });

  test('should signal and reap the child when dropped while running', async () => {
    const proxy = await launchProxyCommand('exec sleep 30');
    proxy.destroy();

    expect(proxy.state).toBe('closed');
    expect(await proxy.wait()).toEqual({ code: null, signal: 'SIGTERM' });
    expect(proxy.state).toBe('reaped');
  });
});
