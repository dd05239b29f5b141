/**
 * Host resolution over a parsed ConfigFile.
 *
 * Stanzas are walked in file order and the first obtained value of each
 * keyword wins, as in OpenSSH. A ResolvedConfig is built fresh per call.
 */

import { createHostNotFoundError } from './errors.js';
import { expandTilde, systemEnvironment, type HostEnvironment } from './environment.js';
import { logger } from './logging.js';
import { matchPatternList } from './patterns.js';
import { loadUserConfig } from './ssh-config.js';
import { expandTokens } from './tokens.js';
import type { ConfigFile, MatchCondition, ResolvedConfig, Stanza } from './types.js';

export const DEFAULT_SSH_PORT = 22;

/** Keywords whose values add up instead of first-wins */
const CUMULATIVE_KEYS = new Set(['identityfile', 'certificatefile']);

/** Pairs where setting one blocks the other */
const EXCLUSIVE_KEYS: Record<string, string> = {
  proxycommand: 'proxyjump',
  proxyjump: 'proxycommand'
};

export interface ResolveOptions {
  environment?: HostEnvironment;
  /** Fail with ENOHOST when only global directives apply */
  requireMatch?: boolean;
  /** Remote user given by the caller; overrides any User directive */
  user?: string;
}

interface ResolveState {
  host: string;
  options: Map<string, string>;
  env: HostEnvironment;
  userOverride?: string;
}

function currentHostName(state: ResolveState): string {
  const configured = state.options.get('hostname');
  return configured === undefined ? state.host : expandTokens(configured, { h: state.host });
}

function currentUser(state: ResolveState): string {
  return state.userOverride ?? state.options.get('user') ?? state.env.localUser();
}

function conditionHolds(condition: MatchCondition, state: ResolveState): boolean {
  switch (condition.keyword) {
    case 'all':
      return true;
    case 'host':
      return matchPatternList(condition.patterns, currentHostName(state));
    case 'originalhost':
      return matchPatternList(condition.patterns, state.host);
    case 'user':
      return matchPatternList(condition.patterns, currentUser(state));
    case 'localuser':
      return matchPatternList(condition.patterns, state.env.localUser());
    case 'exec':
      logger.warn('Match exec is not supported; skipping stanza', { command: condition.patterns[0] });
      return false;
    case 'canonical':
    case 'final':
      return false;
  }
}

function stanzaApplies(stanza: Stanza, state: ResolveState): boolean {
  const { criteria } = stanza;
  switch (criteria.type) {
    case 'global':
      return true;
    case 'host':
      return matchPatternList(criteria.patterns, state.host);
    case 'match':
      return criteria.conditions.every(condition => {
        // Unsupported criteria never apply, negated or not
        if (condition.keyword === 'exec' || condition.keyword === 'canonical' || condition.keyword === 'final') {
          return conditionHolds(condition, state);
        }
        return conditionHolds(condition, state) !== condition.negated;
      });
  }
}

function isNone(value: string | undefined): boolean {
  return value !== undefined && value.toLowerCase() === 'none';
}

/**
 * Resolves the effective settings for a host alias
 */
export function resolveHost(config: ConfigFile, host: string, resolveOptions: ResolveOptions = {}): ResolvedConfig {
  const env = resolveOptions.environment ?? systemEnvironment;
  const state: ResolveState = { host, options: new Map(), env, userOverride: resolveOptions.user };
  const cumulative = new Map<string, string[]>();
  let matched = false;

  for (const stanza of config.stanzas) {
    if (!stanzaApplies(stanza, state)) {
      continue;
    }
    if (stanza.criteria.type !== 'global') {
      matched = true;
    }

    for (const directive of stanza.directives) {
      const { key, value } = directive;

      if (CUMULATIVE_KEYS.has(key)) {
        const values = cumulative.get(key) ?? [];
        if (!values.includes(value)) {
          values.push(value);
        }
        cumulative.set(key, values);
      }

      const exclusive = EXCLUSIVE_KEYS[key];
      if (exclusive !== undefined && state.options.has(exclusive)) {
        continue;
      }
      if (!state.options.has(key)) {
        state.options.set(key, value);
      }
    }
  }

  if (resolveOptions.requireMatch && !matched) {
    throw createHostNotFoundError(host);
  }

  const hostName = currentHostName(state);
  const user = currentUser(state);
  const portValue = state.options.get('port');
  const port = portValue === undefined ? DEFAULT_SSH_PORT : Number(portValue);

  const tokens = {
    d: env.homeDir(),
    u: env.localUser(),
    l: env.localHostName(),
    h: hostName,
    r: user,
    n: host,
    p: String(port)
  };
  const expandPaths = (key: string) =>
    (cumulative.get(key) ?? []).map(file => expandTilde(expandTokens(file, tokens), env));

  const proxyCommand = state.options.get('proxycommand');
  const proxyJump = state.options.get('proxyjump');

  const resolved: ResolvedConfig = {
    host,
    hostName,
    port,
    user,
    identityFiles: expandPaths('identityfile'),
    certificateFiles: expandPaths('certificatefile'),
    options: Object.fromEntries(state.options),
    matched
  };
  if (proxyCommand !== undefined && !isNone(proxyCommand)) {
    resolved.proxyCommand = proxyCommand;
  }
  if (proxyJump !== undefined && !isNone(proxyJump)) {
    resolved.proxyJump = proxyJump;
  }

  logger.debug('Resolved SSH host', { host, hostName, port, user, matched });
  return resolved;
}

/**
 * Resolves a host alias against the user's default config
 */
export async function resolveUserHost(host: string, resolveOptions: ResolveOptions = {}): Promise<ResolvedConfig> {
  const config = await loadUserConfig({ environment: resolveOptions.environment });
  return resolveHost(config, host, resolveOptions);
}
