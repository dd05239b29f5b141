/**
 * Percent-token expansion for ProxyCommand, HostName and IdentityFile values
 */

import { createBadRequestError, createSyntaxError } from './errors.js';
import { BuildCommandSchema, type ProxyCommandSpec, type ResolvedConfig } from './types.js';

export type TokenValues = Partial<Record<string, string>>;

/**
 * Optional tokens beyond %h, %p and %r
 */
export interface ExtraTokens {
  /** %n: host alias as given on the command line */
  originalHost?: string;
  /** %u */
  localUser?: string;
  /** %l */
  localHostName?: string;
  /** %d */
  homeDir?: string;
}

/**
 * Expands `%x` tokens in a single left-to-right pass.
 *
 * `%%` becomes `%`. Tokens with no value, and a trailing lone `%`, are kept
 * verbatim.
 */
export function expandTokens(template: string, values: TokenValues): string {
  return template.replace(/%([\s\S])/g, (token: string, letter: string) => {
    if (letter === '%') {
      return '%';
    }
    const value = values[letter];
    return value === undefined ? token : value;
  });
}

/**
 * Substitutes connection values into a ProxyCommand template
 */
export function buildCommand(
  spec: ProxyCommandSpec,
  host: string,
  port: number,
  remoteUser: string,
  extra: ExtraTokens = {}
): string {
  const parsed = BuildCommandSchema.safeParse({ host, port, remoteUser });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createBadRequestError(
      `Invalid ProxyCommand parameter ${issue.path.join('.')}: ${issue.message}`,
      'Port must be an integer between 1 and 65535 and host must be non-empty'
    );
  }

  return expandTokens(spec.template, {
    h: host,
    p: String(port),
    r: remoteUser,
    n: extra.originalHost,
    u: extra.localUser,
    l: extra.localHostName,
    d: extra.homeDir
  });
}

interface JumpHop {
  user?: string;
  host: string;
  port?: string;
}

function parseJumpHop(hop: string): JumpHop {
  // Hops end up in a shell command line, so only plain names are accepted
  const match = hop.match(/^(?:ssh:\/\/)?(?:(\w[\w.+-]*)@)?(\[[0-9A-Fa-f:.]+\]|\w[\w.-]*)(?::(\d+))?$/);
  if (!match) {
    throw createSyntaxError(
      `Invalid ProxyJump hop "${hop}"`,
      {},
      'Expected [user@]host[:port] or ssh://[user@]host[:port]'
    );
  }
  const [, user, host, port] = match;
  return { user, host, port };
}

/**
 * Rewrites a ProxyJump chain as the equivalent `ssh -W` ProxyCommand
 */
export function proxyJumpCommand(jump: string): string {
  const hops = jump.split(',').map(h => h.trim()).filter(h => h.length > 0);
  const last = hops.pop();
  if (last === undefined) {
    throw createSyntaxError('ProxyJump has no hosts');
  }
  hops.forEach(parseJumpHop);

  const target = parseJumpHop(last);
  const args = ['ssh'];
  if (target.user) {
    args.push('-l', target.user);
  }
  if (target.port) {
    args.push('-p', target.port);
  }
  if (hops.length > 0) {
    args.push('-J', hops.join(','));
  }
  args.push('-W', '%h:%p', target.host);
  return args.join(' ');
}

/**
 * Picks the proxy template that applies to a resolved host, if any
 */
export function proxyCommandSpec(resolved: ResolvedConfig): ProxyCommandSpec | undefined {
  if (resolved.proxyCommand) {
    return { template: resolved.proxyCommand, origin: 'ProxyCommand' };
  }
  if (resolved.proxyJump) {
    return { template: proxyJumpCommand(resolved.proxyJump), origin: 'ProxyJump' };
  }
  return undefined;
}
