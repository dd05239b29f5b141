/**
 * ProxyCommand launcher
 *
 * Runs a proxy command through the platform shell and exposes its
 * stdin/stdout as a Duplex that an SSH client can use as its socket.
 * Lifecycle: spawned -> running -> closed -> reaped.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import { Duplex, type Readable, type Writable } from 'stream';
import { createIOError, createSpawnError, errnoCode } from './errors.js';
import { createTimer, logger } from './logging.js';
import type { ProxyExit, ProxyState } from './types.js';

export const DEFAULT_KILL_TIMEOUT_MS = 2000;

/** Shell exit statuses for "command not found" and "not executable" */
const SHELL_LAUNCH_FAILURES = [126, 127];

export interface LaunchOptions {
  /** Shell to run the command with; true selects the platform default */
  shell?: boolean | string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** How long close() waits for each exit stage before escalating */
  killTimeoutMs?: number;
}

type ProxyChild = ChildProcessByStdio<Writable, Readable, null>;

const liveProcesses = new Set<ProxyProcess>();
let exitHookInstalled = false;

function track(proxy: ProxyProcess): void {
  if (!exitHookInstalled) {
    exitHookInstalled = true;
    process.once('exit', () => {
      for (const live of liveProcesses) {
        live.kill('SIGKILL');
      }
    });
  }
  liveProcesses.add(proxy);
}

function pipeError(error: Error, command: string) {
  const code = errnoCode(error);
  return createIOError(
    `Proxy command pipe failed${code ? ` (${code})` : ''}: ${error.message}`,
    { cause: error },
    code === 'EPIPE' ? `The proxy command "${command}" stopped reading its input` : undefined
  );
}

/**
 * Duplex over a proxy command's standard streams. Owns the child process.
 */
export class ProxyProcess extends Duplex {
  readonly command: string;
  private readonly child: ProxyChild;
  private readonly killTimeoutMs: number;
  private readonly exited: Promise<ProxyExit>;
  private readonly timer = createTimer();
  private currentState: ProxyState = 'spawned';
  private exitInfo: ProxyExit | undefined;
  private bytesRead = 0;
  private stdoutEnded = false;
  private terminating = false;

  constructor(child: ProxyChild, command: string, killTimeoutMs = DEFAULT_KILL_TIMEOUT_MS) {
    super({ allowHalfOpen: true });
    this.child = child;
    this.command = command;
    this.killTimeoutMs = killTimeoutMs;

    this.exited = new Promise(resolve => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.onChildExit({ code, signal });
        resolve({ code, signal });
      });
    });

    child.stdout.on('data', (chunk: Buffer) => {
      this.bytesRead += chunk.length;
      if (!this.push(chunk)) {
        child.stdout.pause();
      }
    });
    child.stdout.once('end', () => {
      this.stdoutEnded = true;
      this.markClosed();
      if (!this.destroyed) {
        this.push(null);
      }
    });
    child.stdout.on('error', (error: Error) => this.destroy(pipeError(error, command)));
    child.stdin.on('error', (error: Error) => this.destroy(pipeError(error, command)));
    child.once('spawn', () => this.markRunning());
    child.on('error', (error: Error) => {
      // Errors before 'spawn' are reported by launchProxyCommand
      if (this.currentState !== 'spawned') {
        this.destroy(createIOError(`Proxy command failed: ${error.message}`, { cause: error }));
      }
    });
  }

  get state(): ProxyState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Exit status, once the child has been reaped */
  get exitStatus(): ProxyExit | undefined {
    return this.exitInfo;
  }

  private markRunning(): void {
    if (this.currentState === 'spawned') {
      this.currentState = 'running';
      track(this);
    }
  }

  private markClosed(): void {
    if (this.currentState === 'spawned' || this.currentState === 'running') {
      this.currentState = 'closed';
    }
  }

  private onChildExit(exit: ProxyExit): void {
    this.exitInfo = exit;
    this.currentState = 'reaped';
    liveProcesses.delete(this);

    const data = { code: exit.code, signal: exit.signal, durationMs: this.timer.elapsed() };
    if (exit.code !== 0 && !this.terminating) {
      logger.warn(`Proxy command exited abnormally: ${this.command}`, data);
    } else {
      logger.debug(`Proxy command exited: ${this.command}`, data);
    }

    // A shell that could not run the command exits 126/127 without output
    if (this.bytesRead === 0 && !this.destroyed && exit.code !== null && SHELL_LAUNCH_FAILURES.includes(exit.code)) {
      this.destroy(createSpawnError(
        `Proxy command could not be started (exit status ${exit.code})`,
        { exitCode: exit.code, signal: exit.signal },
        'Check that the command in ProxyCommand exists and is executable'
      ));
    }
  }

  /**
   * Sends a signal to the child unless it has already exited
   */
  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    if (this.child.pid === undefined || this.exitInfo !== undefined) {
      return false;
    }
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return false;
    }
    this.terminating = true;
    return this.child.kill(signal);
  }

  /**
   * Resolves with the exit status once the child has been reaped
   */
  wait(): Promise<ProxyExit> {
    return this.exited;
  }

  /**
   * Ends the child's input and waits for it to exit, escalating to
   * SIGTERM and then SIGKILL after killTimeoutMs each.
   */
  async close(): Promise<ProxyExit> {
    this.markClosed();
    const stdin = this.child.stdin;
    if (!stdin.destroyed && !stdin.writableEnded) {
      stdin.end();
    }

    let exit = await this.waitFor(this.killTimeoutMs);
    if (!exit) {
      logger.debug('Proxy command still running after stdin closed; sending SIGTERM', { pid: this.pid });
      this.kill('SIGTERM');
      exit = await this.waitFor(this.killTimeoutMs);
    }
    if (!exit) {
      logger.warn('Proxy command ignored SIGTERM; sending SIGKILL', { pid: this.pid });
      this.kill('SIGKILL');
      exit = await this.exited;
    }

    this.destroy();
    return exit;
  }

  private async waitFor(ms: number): Promise<ProxyExit | undefined> {
    let timeout: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        this.exited,
        new Promise<undefined>(resolve => {
          timeout = setTimeout(() => resolve(undefined), ms);
        })
      ]);
    } finally {
      clearTimeout(timeout);
    }
  }

  override _read(): void {
    this.child.stdout.resume();
  }

  override _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.child.stdin.write(chunk, encoding, error => {
      callback(error ? pipeError(error, this.command) : null);
    });
  }

  override _final(callback: (error?: Error | null) => void): void {
    const stdin = this.child.stdin;
    if (stdin.destroyed || stdin.writableEnded) {
      callback();
      return;
    }
    stdin.end(() => callback());
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.markClosed();
    const finished = error === null && this.stdoutEnded && this.child.stdin.writableEnded;
    if (!finished) {
      // Dropped while running
      this.kill('SIGTERM');
    }
    this.child.stdin.destroy();
    this.child.stdout.destroy();
    this.reapEventually(finished ? 'SIGTERM' : 'SIGKILL');
    callback(error);
  }

  private reapEventually(signal: NodeJS.Signals): void {
    if (this.exitInfo !== undefined) {
      return;
    }
    const escalation = setTimeout(() => this.kill(signal), this.killTimeoutMs);
    escalation.unref();
    const clear = () => clearTimeout(escalation);
    this.exited.then(clear, clear);
  }
}

/**
 * Spawns a proxy command and resolves once the process is running
 */
export function launchProxyCommand(command: string, options: LaunchOptions = {}): Promise<ProxyProcess> {
  logger.debug(`Launching proxy command: ${command}`);

  return new Promise((resolve, reject) => {
    let child: ProxyChild;
    try {
      child = spawn(command, {
        shell: options.shell ?? true,
        stdio: ['pipe', 'pipe', 'inherit'],
        env: options.env,
        cwd: options.cwd,
        windowsHide: true
      });
    } catch (error) {
      reject(createSpawnError(
        `Failed to start proxy command: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      ));
      return;
    }

    const proxy = new ProxyProcess(child, command, options.killTimeoutMs);

    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      proxy.destroy();
      reject(createSpawnError(
        `Failed to start proxy command: ${error.message}`,
        { cause: error },
        errnoCode(error) === 'ENOENT' ? 'Check that the shell used to run ProxyCommand exists' : undefined
      ));
    };
    const onSpawn = () => {
      child.off('error', onError);
      logger.debug('Proxy command running', { pid: child.pid });
      resolve(proxy);
    };

    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}
