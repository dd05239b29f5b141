/**
 * Host environment lookups: home directory, local user and host name.
 *
 * Everything that would otherwise read process-global state goes through a
 * HostEnvironment so callers and tests can pin the values.
 */

import * as os from 'os';
import * as path from 'path';

export interface HostEnvironment {
  homeDir(): string;
  localUser(): string;
  localHostName(): string;
  /** Default client config path */
  configPath(): string;
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo throws when the uid has no passwd entry (common in containers)
    return process.env.USER ?? process.env.USERNAME ?? '';
  }
}

export const systemEnvironment: HostEnvironment = {
  homeDir: () => os.homedir(),
  localUser: currentUser,
  localHostName: () => os.hostname(),
  configPath: () => process.env.SSH_CONFIG_PATH || path.join(os.homedir(), '.ssh', 'config')
};

/**
 * Builds an environment with fixed values, falling back to the system for the rest
 */
export function fixedEnvironment(values: {
  homeDir?: string;
  localUser?: string;
  localHostName?: string;
  configPath?: string;
}): HostEnvironment {
  const homeDir = values.homeDir;
  return {
    homeDir: () => homeDir ?? systemEnvironment.homeDir(),
    localUser: () => values.localUser ?? systemEnvironment.localUser(),
    localHostName: () => values.localHostName ?? systemEnvironment.localHostName(),
    configPath: () =>
      values.configPath ??
      (homeDir !== undefined ? path.join(homeDir, '.ssh', 'config') : systemEnvironment.configPath())
  };
}

/**
 * Expands a leading `~` to the home directory
 */
export function expandTilde(filePath: string, env: HostEnvironment = systemEnvironment): string {
  if (filePath === '~') {
    return env.homeDir();
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(env.homeDir(), filePath.slice(2));
  }
  return filePath;
}
