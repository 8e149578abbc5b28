/**
 * Match Spec Parser
 *
 * Parses a single package specification entry, as found in the
 * dependency list of an environment file, into a package name and a
 * predicate over installed package records.
 *
 * Supported forms:
 *   - "numpy"                      any version, any build
 *   - "numpy=1.2"                  fuzzy version (1.2, 1.2.x)
 *   - "numpy=1.2=py_0"             exact version and build
 *   - "numpy 1.2 py_0"             exact version and build
 *   - "numpy>=1.2,<2|==0.9"        version expression
 *   - "conda-forge::numpy"         channel prefix (ignored for matching)
 *   - "numpy[version='>=1.2', build='py*']"
 *
 * @module packages/core/domain/match-spec
 */

import { SpecParseError } from './errors.js';
import type { PackageRecord } from './types.js';
import { compareVersions, globMatcher, startsWithVersion } from './version.js';

// =============================================================================
// Types
// =============================================================================

export type VersionPredicate = (version: string) => boolean;
export type BuildPredicate = (build: string) => boolean;

/**
 * A parsed specification entry
 */
export interface MatchSpec {
  /** Entry text exactly as given */
  readonly source: string;
  /** Lowercased package name */
  readonly name: string;
  /** Channel prefix, if any */
  readonly channel?: string;
  /** Version expression, if constrained */
  readonly version?: string;
  /** Build expression, if constrained */
  readonly build?: string;
  /** Whether an installed record satisfies this entry */
  match(record: PackageRecord): boolean;
}

// =============================================================================
// Constants
// =============================================================================

const NAME_REGEX = /^[a-z0-9_][a-z0-9_.-]*$/;
const NAME_PREFIX_REGEX = /^([A-Za-z0-9_][A-Za-z0-9_.-]*)(.*)$/;
const OPERATOR_REGEX = /^(==|!=|>=|<=|~=|>|<|=)$/;
const CLAUSE_REGEX = /^(==|!=|>=|<=|~=|>|<|=)?\s*([A-Za-z0-9_.+*-]+)$/;
const BRACKET_KEYS = new Set(['version', 'build', 'channel', 'subdir']);

const ANY = (): boolean => true;

// =============================================================================
// Version Expressions
// =============================================================================

/**
 * Matcher for a version token without an ordering operator.
 * A trailing "*" or ".*" means prefix match, any other "*" is a glob.
 */
function patternPredicate(token: string): VersionPredicate {
  if (token === '*') {
    return ANY;
  }
  const stars = token.split('*').length - 1;
  if (stars === 0) {
    return (version) => compareVersions(version, token) === 0;
  }
  if (stars === 1 && token.endsWith('*')) {
    const base = token.replace(/\.?\*$/, '');
    return (version) => startsWithVersion(version, base);
  }
  return globMatcher(token);
}

function compileClause(clause: string, entry: string): VersionPredicate {
  const match = CLAUSE_REGEX.exec(clause.trim());
  if (!match) {
    throw new SpecParseError(entry, `invalid version constraint "${clause.trim()}"`);
  }
  const operator = match[1];
  const token = match[2] ?? '';

  if (operator === undefined || operator === '==') {
    return patternPredicate(token);
  }
  if (operator === '=') {
    return patternPredicate(token.endsWith('*') ? token : `${token}*`);
  }
  if (operator === '!=') {
    const equal = patternPredicate(token);
    return (version) => !equal(version);
  }
  if (token.includes('*')) {
    throw new SpecParseError(entry, `wildcard not allowed after "${operator}"`);
  }

  switch (operator) {
    case '>=':
      return (version) => compareVersions(version, token) >= 0;
    case '<=':
      return (version) => compareVersions(version, token) <= 0;
    case '>':
      return (version) => compareVersions(version, token) > 0;
    case '<':
      return (version) => compareVersions(version, token) < 0;
    case '~=': {
      const segments = token.split('.');
      if (segments.length < 2) {
        throw new SpecParseError(entry, `"~=" needs at least two version segments`);
      }
      const base = segments.slice(0, -1).join('.');
      return (version) => compareVersions(version, token) >= 0 && startsWithVersion(version, base);
    }
    default:
      throw new SpecParseError(entry, `unsupported operator "${operator}"`);
  }
}

/**
 * Compile a version expression: clauses joined by "," (and) and "|" (or)
 */
export function compileVersionExpression(expression: string, entry = expression): VersionPredicate {
  const alternatives = expression.split('|').map((alternative) => {
    const clauses = alternative.split(',');
    if (clauses.some((clause) => clause.trim() === '')) {
      throw new SpecParseError(entry, `empty clause in version expression "${expression}"`);
    }
    return clauses.map((clause) => compileClause(clause, entry));
  });

  return (version) => alternatives.some((clauses) => clauses.every((predicate) => predicate(version)));
}

/**
 * Compile a build expression: exact string or glob
 */
export function compileBuildExpression(expression: string, entry = expression): BuildPredicate {
  if (!/^[A-Za-z0-9_.+*-]+$/.test(expression)) {
    throw new SpecParseError(entry, `invalid build string "${expression}"`);
  }
  if (expression === '*') {
    return ANY;
  }
  if (expression.includes('*')) {
    return globMatcher(expression);
  }
  return (build) => build === expression;
}

// =============================================================================
// Bracket Block
// =============================================================================

/**
 * Parse the inside of a "[key=value, ...]" block. Values may be quoted,
 * and quoted values may contain commas.
 */
function parseBracket(body: string, entry: string): Map<string, string> {
  const fields = new Map<string, string>();
  let rest = body.trim();

  while (rest.length > 0) {
    const keyMatch = /^([a-z_]+)\s*=\s*/.exec(rest);
    if (!keyMatch) {
      throw new SpecParseError(entry, `invalid bracket field "${rest}"`);
    }
    const key = keyMatch[1] ?? '';
    if (!BRACKET_KEYS.has(key)) {
      throw new SpecParseError(entry, `unsupported bracket key "${key}"`);
    }
    rest = rest.slice(keyMatch[0].length);

    let value: string;
    const quote = rest[0];
    if (quote === '"' || quote === "'") {
      const close = rest.indexOf(quote, 1);
      if (close === -1) {
        throw new SpecParseError(entry, `unterminated quote in bracket field "${key}"`);
      }
      value = rest.slice(1, close);
      rest = rest.slice(close + 1).trim();
    } else {
      const comma = rest.indexOf(',');
      value = (comma === -1 ? rest : rest.slice(0, comma)).trim();
      rest = comma === -1 ? '' : rest.slice(comma);
    }

    if (value === '') {
      throw new SpecParseError(entry, `empty value for bracket key "${key}"`);
    }
    fields.set(key, value);

    if (rest.startsWith(',')) {
      rest = rest.slice(1).trim();
    } else if (rest.length > 0) {
      throw new SpecParseError(entry, `expected "," after bracket field "${key}"`);
    }
  }

  return fields;
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse a specification entry
 *
 * @param text - Entry as written in the environment file
 * @returns Parsed entry with its match predicate
 * @throws SpecParseError if the entry is malformed
 *
 * @example
 * parseMatchSpec('numpy=1.2=0').match({ name: 'numpy', version: '1.2', build: '0' })  // true
 * parseMatchSpec('numpy>=2').match({ name: 'numpy', version: '1.2', build: '0' })      // false
 */
export function parseMatchSpec(text: string): MatchSpec {
  const hash = text.indexOf('#');
  let spec = (hash === -1 ? text : text.slice(0, hash)).trim();
  if (spec === '') {
    throw new SpecParseError(text, 'empty specification');
  }

  // Bracket block
  let bracket = new Map<string, string>();
  const open = spec.indexOf('[');
  if (open !== -1) {
    if (!spec.endsWith(']') || spec.indexOf('[', open + 1) !== -1) {
      throw new SpecParseError(text, 'unbalanced brackets');
    }
    bracket = parseBracket(spec.slice(open + 1, -1), text);
    spec = spec.slice(0, open).trim();
  } else if (spec.includes(']')) {
    throw new SpecParseError(text, 'unbalanced brackets');
  }

  // Channel prefix
  let channel = bracket.get('channel');
  const separator = spec.lastIndexOf('::');
  if (separator !== -1) {
    channel = spec.slice(0, separator).trim();
    spec = spec.slice(separator + 2).trim();
    if (channel === '') {
      throw new SpecParseError(text, 'empty channel before "::"');
    }
  }

  let rawName: string;
  let version: string | undefined;
  let build: string | undefined;

  // "python >=3.8, <3.12" is one version expression
  spec = spec.replace(/\s*([,|])\s*/g, '$1');
  spec = spec.replace(/([,|])(==|!=|>=|<=|~=|[<>=])\s+/g, '$1$2');
  const tokens = spec.split(/\s+/).filter((token) => token !== '');
  if (tokens.length > 1) {
    // "name version [build]", allowing "name >= 1.2"
    const [first, ...remaining] = tokens;
    if (remaining.length > 1 && OPERATOR_REGEX.test(remaining[0] ?? '')) {
      remaining.splice(0, 2, `${remaining[0]}${remaining[1]}`);
    }
    if (remaining.length > 2) {
      throw new SpecParseError(text, 'too many space-separated fields');
    }
    rawName = first ?? '';
    [version, build] = remaining;
  } else {
    const match = NAME_PREFIX_REGEX.exec(spec);
    if (!match) {
      throw new SpecParseError(text, 'missing package name');
    }
    rawName = match[1] ?? '';
    const rest = (match[2] ?? '').trim();

    if (rest.startsWith('=') && !rest.startsWith('==')) {
      const parts = rest.slice(1).split('=');
      if (parts.length > 2 || parts.some((part) => part === '')) {
        throw new SpecParseError(text, 'expected name=version or name=version=build');
      }
      // name=version=build pins the version exactly; name=version is fuzzy
      version = parts.length === 2 ? parts[0] : `=${parts[0]}`;
      build = parts[1];
    } else if (rest !== '') {
      version = rest;
    }
  }

  const name = rawName.toLowerCase();
  if (!NAME_REGEX.test(name)) {
    throw new SpecParseError(text, `invalid package name "${rawName}"`);
  }

  version = bracket.get('version') ?? version;
  build = bracket.get('build') ?? build;

  const versionPredicate = version === undefined ? ANY : compileVersionExpression(version, text);
  const buildPredicate = build === undefined ? ANY : compileBuildExpression(build, text);

  return {
    source: text,
    name,
    channel,
    version,
    build,
    match: (record) => versionPredicate(record.version) && buildPredicate(record.build),
  };
}
