import { z } from 'zod';

/**
 * Where a stanza or directive came from
 */
export interface SourceLocation {
  path?: string;
  line: number;
}

/**
 * A single `Keyword value` line
 */
export interface Directive {
  /** Lowercased keyword, used for lookups */
  key: string;
  /** Keyword as written in the file */
  name: string;
  value: string;
  /** Tokenized arguments; ProxyCommand keeps its whole text as one */
  args: string[];
  origin: SourceLocation;
}

export type MatchKeyword =
  | 'all'
  | 'host'
  | 'originalhost'
  | 'user'
  | 'localuser'
  | 'exec'
  | 'canonical'
  | 'final';

export interface MatchCondition {
  keyword: MatchKeyword;
  negated: boolean;
  /** Comma-separated pattern list for host/user criteria, or the raw command for exec */
  patterns: string[];
}

export type StanzaCriteria =
  | { type: 'global' }
  | { type: 'host'; patterns: string[] }
  | { type: 'match'; conditions: MatchCondition[] };

export interface Stanza {
  criteria: StanzaCriteria;
  directives: readonly Directive[];
  origin: SourceLocation;
}

/**
 * Parsed config with every Include expanded in place
 */
export interface ConfigFile {
  stanzas: readonly Stanza[];
  /** Every file read while parsing, in read order */
  files: readonly string[];
}

/**
 * Flattened settings for one target host
 */
export interface ResolvedConfig {
  /** Host alias as requested */
  host: string;
  hostName: string;
  port: number;
  user: string;
  identityFiles: string[];
  certificateFiles: string[];
  proxyCommand?: string;
  proxyJump?: string;
  /** First obtained value of every applied directive, keyed by lowercased keyword */
  options: Record<string, string>;
  /** True when at least one Host or Match stanza applied */
  matched: boolean;
}

/**
 * Unexpanded ProxyCommand template
 */
export interface ProxyCommandSpec {
  template: string;
  origin?: 'ProxyCommand' | 'ProxyJump';
}

export type ProxyState = 'spawned' | 'running' | 'closed' | 'reaped';

export interface ProxyExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Error codes for config parsing and proxy transport operations
 */
export enum ErrorCode {
  ESYNTAX = 'ESYNTAX',
  EIO = 'EIO',
  EINCLUDEDEPTH = 'EINCLUDEDEPTH',
  ESPAWN = 'ESPAWN',
  ENOHOST = 'ENOHOST',
  EBADREQ = 'EBADREQ',
  ECONN = 'ECONN'
}

export interface ErrorDetails {
  path?: string;
  line?: number;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  cause?: unknown;
}

/**
 * Structured error class for config and proxy operations
 */
export class SSHConfigError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public hint?: string,
    public details: ErrorDetails = {}
  ) {
    super(message);
    this.name = 'SSHConfigError';
  }
}

export const PortSchema = z.number().int().min(1).max(65535);

export const BuildCommandSchema = z.object({
  host: z.string().min(1),
  port: PortSchema,
  remoteUser: z.string()
});

export const ConnectOptionsSchema = z.object({
  host: z.string().min(1),
  username: z.string().min(1).optional(),
  port: PortSchema.optional(),
  password: z.string().optional(),
  privateKeyPath: z.string().optional(),
  passphrase: z.string().optional(),
  readyTimeoutMs: z.number().min(1000).optional().default(20000),
  requireMatch: z.boolean().optional().default(false)
});

export type ConnectOptions = z.input<typeof ConnectOptionsSchema>;
