/**
 * SSH Config Parser
 *
 * Parses OpenSSH client config text into an ordered list of stanzas.
 * Include directives are expanded eagerly, in place, so the resulting
 * ConfigFile needs no further I/O to resolve a host.
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import { createIncludeDepthError, createIOError, createSyntaxError, errnoCode } from './errors.js';
import { systemEnvironment, expandTilde, type HostEnvironment } from './environment.js';
import { logger } from './logging.js';
import { splitPatternList } from './patterns.js';
import {
  PortSchema,
  type ConfigFile,
  type Directive,
  type MatchCondition,
  type MatchKeyword,
  type SourceLocation,
  type Stanza,
  type StanzaCriteria
} from './types.js';

/** Same nesting limit as OpenSSH's readconf */
export const DEFAULT_MAX_INCLUDE_DEPTH = 16;

export interface ParseOptions {
  /** Path the text was read from; used in errors and to resolve relative includes */
  path?: string;
  /** Directory for relative includes when `path` is not set. Defaults to ~/.ssh */
  baseDir?: string;
  environment?: HostEnvironment;
  maxIncludeDepth?: number;
}

const KEYWORD = /^[A-Za-z][A-Za-z0-9]*$/;

const MATCH_KEYWORDS: readonly MatchKeyword[] = [
  'all',
  'host',
  'originalhost',
  'user',
  'localuser',
  'exec',
  'canonical',
  'final'
];

const SINGLE_VALUED = new Set([
  'hostname',
  'user',
  'port',
  'proxyjump',
  'identityfile',
  'certificatefile',
  'connecttimeout'
]);

const ARGUMENTLESS: readonly MatchKeyword[] = ['all', 'canonical', 'final'];

function isMatchKeyword(value: string): value is MatchKeyword {
  return MATCH_KEYWORDS.some(keyword => keyword === value);
}

interface Tokens {
  args: string[];
  /** Offset where a trailing comment starts, or the text length */
  end: number;
}

function tokenize(text: string, location: SourceLocation): Tokens {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | undefined;
  let hasToken = false;
  let end = text.length;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== undefined) {
      if (ch === quote) {
        quote = undefined;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      hasToken = true;
    } else if (ch === ' ' || ch === '\t') {
      if (hasToken) {
        args.push(current);
        current = '';
        hasToken = false;
      }
    } else if (ch === '#' && !hasToken) {
      end = i;
      break;
    } else {
      current += ch;
      hasToken = true;
    }
  }

  if (quote !== undefined) {
    throw createSyntaxError('Unterminated quoted string', location);
  }
  if (hasToken) {
    args.push(current);
  }
  return { args, end };
}

/**
 * Splits directive arguments on whitespace, honouring single and double
 * quotes. An unquoted word starting with `#` ends the line.
 */
export function splitArguments(text: string, location: SourceLocation = { line: 0 }): string[] {
  return tokenize(text, location).args;
}

function parseMatchConditions(args: string[], location: SourceLocation): MatchCondition[] {
  const conditions: MatchCondition[] = [];

  for (let i = 0; i < args.length; ) {
    const word = args[i++];
    const negated = word.startsWith('!');
    const keyword = (negated ? word.slice(1) : word).toLowerCase();

    if (!isMatchKeyword(keyword)) {
      throw createSyntaxError(`Unsupported Match criteria "${word}"`, location);
    }

    if (ARGUMENTLESS.includes(keyword)) {
      conditions.push({ keyword, negated, patterns: [] });
      continue;
    }

    if (i >= args.length) {
      throw createSyntaxError(`Match criteria "${keyword}" requires an argument`, location);
    }
    const argument = args[i++];
    conditions.push({
      keyword,
      negated,
      patterns: keyword === 'exec' ? [argument] : splitPatternList(argument)
    });
  }

  const others = conditions.filter(c => !ARGUMENTLESS.includes(c.keyword));
  if (conditions.some(c => c.keyword === 'all') && others.length > 0) {
    throw createSyntaxError('Match "all" cannot be combined with other criteria', location);
  }

  return conditions;
}

function validateDirective(directive: Directive): void {
  if (directive.key === 'port') {
    const port = /^\d+$/.test(directive.value) ? Number(directive.value) : NaN;
    if (!PortSchema.safeParse(port).success) {
      throw createSyntaxError(`Invalid port "${directive.value}"`, directive.origin);
    }
  }
}

interface Frame {
  path?: string;
  baseDir: string;
  depth: number;
}

interface Segment {
  criteria: StanzaCriteria;
  origin: SourceLocation;
  directives: Directive[];
  /** Opened by a Host or Match line, so it is kept even when empty */
  explicit: boolean;
}

class ConfigReader {
  readonly stanzas: Stanza[] = [];
  readonly files: string[] = [];

  constructor(
    private readonly env: HostEnvironment,
    private readonly maxDepth: number
  ) {}

  async read(text: string, frame: Frame, outer: Segment): Promise<void> {
    let current: Segment = { criteria: outer.criteria, origin: outer.origin, directives: [], explicit: false };
    const lines = text.split(/\r?\n/);

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index].trim();
      if (!line || line.startsWith('#')) {
        continue;
      }

      const location: SourceLocation = { path: frame.path, line: index + 1 };
      const match = line.match(/^([^\s=]+)(\s*=\s*|\s+)?(.*)$/);
      if (!match) {
        throw createSyntaxError(`Cannot parse "${line}"`, location);
      }

      const [, name, , rest] = match;
      if (!KEYWORD.test(name)) {
        throw createSyntaxError(`Invalid keyword "${name}"`, location);
      }
      const key = name.toLowerCase();
      const raw = rest.trim();
      if (!raw) {
        throw createSyntaxError(`Missing value for ${name}`, location);
      }

      // ProxyCommand is handed to a shell verbatim
      if (key === 'proxycommand') {
        current.directives.push({ key, name, value: raw, args: [raw], origin: location });
        continue;
      }

      const { args, end } = tokenize(raw, location);
      if (args.length === 0) {
        throw createSyntaxError(`Missing value for ${name}`, location);
      }

      if (key === 'host') {
        this.flush(current);
        current = { criteria: { type: 'host', patterns: args }, origin: location, directives: [], explicit: true };
        continue;
      }

      if (key === 'match') {
        this.flush(current);
        current = {
          criteria: { type: 'match', conditions: parseMatchConditions(args, location) },
          origin: location,
          directives: [],
          explicit: true
        };
        continue;
      }

      if (key === 'include') {
        this.flush(current);
        for (const arg of args) {
          for (const file of await this.expandInclude(arg, frame, location)) {
            await this.readInclude(file, frame, current, location);
          }
        }
        current = { criteria: current.criteria, origin: current.origin, directives: [], explicit: false };
        continue;
      }

      if (args.length > 1 && SINGLE_VALUED.has(key)) {
        throw createSyntaxError(`${name} takes a single argument, got ${args.length}`, location);
      }
      const value = args.length === 1 ? args[0] : raw.slice(0, end).trimEnd();
      const directive: Directive = { key, name, value, args, origin: location };
      validateDirective(directive);
      current.directives.push(directive);
    }

    this.flush(current);
  }

  private flush(segment: Segment): void {
    if (!segment.explicit && segment.directives.length === 0) {
      return;
    }
    this.stanzas.push(Object.freeze({
      criteria: segment.criteria,
      origin: segment.origin,
      directives: Object.freeze([...segment.directives])
    }));
  }

  private async expandInclude(arg: string, frame: Frame, location: SourceLocation): Promise<string[]> {
    const expanded = expandTilde(arg, this.env);
    const absolute = path.isAbsolute(expanded) ? expanded : path.join(frame.baseDir, expanded);

    if (!fg.isDynamicPattern(expanded)) {
      return [absolute];
    }

    const matches = path.isAbsolute(expanded)
      ? await fg(expanded, { absolute: true, onlyFiles: true, dot: true })
      : await fg(expanded, { cwd: frame.baseDir, absolute: true, onlyFiles: true, dot: true });

    if (matches.length === 0) {
      logger.debug('Include pattern matched no files', { pattern: absolute, path: location.path, line: location.line });
    }
    return matches.sort();
  }

  private async readInclude(file: string, frame: Frame, outer: Segment, location: SourceLocation): Promise<void> {
    const depth = frame.depth + 1;
    if (depth > this.maxDepth) {
      throw createIncludeDepthError(this.maxDepth, { path: location.path, line: location.line });
    }

    const text = await readConfigText(file, location);
    this.files.push(file);
    await this.read(text, { path: file, baseDir: path.dirname(file), depth }, outer);
  }
}

async function readConfigText(file: string, location?: SourceLocation): Promise<string> {
  try {
    return await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createIOError(
      `Cannot read SSH config ${file}: ${reason}`,
      { path: location?.path ?? file, line: location?.line, cause: error },
      errnoCode(error) === 'ENOENT' ? 'Check the path in the Include directive' : undefined
    );
  }
}

function finish(reader: ConfigReader): ConfigFile {
  return Object.freeze({
    stanzas: Object.freeze([...reader.stanzas]),
    files: Object.freeze([...reader.files])
  });
}

const GLOBAL_SEGMENT: Segment = {
  criteria: { type: 'global' },
  origin: { line: 0 },
  directives: [],
  explicit: false
};

/**
 * Parses SSH config text
 */
export async function parseConfig(source: string, options: ParseOptions = {}): Promise<ConfigFile> {
  const env = options.environment ?? systemEnvironment;
  const reader = new ConfigReader(env, options.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH);
  const baseDir = options.path
    ? path.dirname(options.path)
    : options.baseDir ?? path.join(env.homeDir(), '.ssh');

  if (options.path) {
    reader.files.push(options.path);
  }
  await reader.read(source, { path: options.path, baseDir, depth: 0 }, { ...GLOBAL_SEGMENT, origin: { path: options.path, line: 0 } });

  const config = finish(reader);
  logger.debug('SSH config parsed', {
    path: options.path,
    stanzaCount: config.stanzas.length,
    fileCount: config.files.length
  });
  return config;
}

/**
 * Reads and parses an SSH config file
 */
export async function parseConfigFile(filePath: string, options: Omit<ParseOptions, 'path'> = {}): Promise<ConfigFile> {
  const text = await readConfigText(filePath);
  return parseConfig(text, { ...options, path: filePath });
}

/**
 * Parses the user's default config, treating a missing file as empty
 */
export async function loadUserConfig(options: Omit<ParseOptions, 'path'> = {}): Promise<ConfigFile> {
  const env = options.environment ?? systemEnvironment;
  const configPath = env.configPath();

  try {
    await fs.promises.access(configPath, fs.constants.F_OK);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      logger.debug('SSH config file not found', { path: configPath });
      return emptyConfig();
    }
    throw createIOError(`Cannot access SSH config ${configPath}`, { path: configPath, cause: error });
  }

  return parseConfigFile(configPath, options);
}

export function emptyConfig(): ConfigFile {
  return Object.freeze({ stanzas: Object.freeze([]), files: Object.freeze([]) });
}

/**
 * Lists literal Host aliases, skipping wildcard and negated patterns
 */
export function listHostAliases(config: ConfigFile): string[] {
  const aliases = new Set<string>();
  for (const stanza of config.stanzas) {
    if (stanza.criteria.type !== 'host') {
      continue;
    }
    for (const pattern of stanza.criteria.patterns) {
      if (!/[*?!]/.test(pattern)) {
        aliases.add(pattern);
      }
    }
  }
  return [...aliases];
}
