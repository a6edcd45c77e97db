/**
 * TypeSpec parser - constraint expressions into normalized token lists
 *
 *   'int'              → [int]
 *   'int|string|null'  → [int, string, null]
 *   '?Date'            → [Date, null]
 *   'int|scalar'       → [scalar]          (subsumed tokens dropped)
 *   'mixed'            → anyOk
 */

import { ConstraintSyntaxError } from '../errors';
import { BASIC_TYPE_NAMES, NOMINAL_NAME, PSEUDO_SUBSUMES, PSEUDO_TYPE_NAMES } from './constants';
import type { BasicTypeName, PseudoTypeName, TypeToken } from './types';

export interface ParsedTypeSpec {
  readonly anyOk: boolean;
  readonly tokens: readonly TypeToken[];
}

const ANY: ParsedTypeSpec = { anyOk: true, tokens: [] };

function isBasicName(name: string): name is BasicTypeName {
  return BASIC_TYPE_NAMES.some((basic) => basic === name);
}

function isPseudoName(name: string): name is PseudoTypeName {
  return PSEUDO_TYPE_NAMES.some((pseudo) => pseudo === name);
}

export function tokenKey(token: TypeToken): string {
  return token.kind === 'nominal' ? `#${token.name}` : token.name;
}

/**
 * Resolves a single type name. Lower-case words must be known keywords;
 * anything else must look like a class or interface name.
 */
export function classifyTypeName(name: string, expression = name): TypeToken {
  if (isBasicName(name)) return { kind: 'basic', name };
  if (isPseudoName(name)) return { kind: 'pseudo', name };
  if (NOMINAL_NAME.test(name)) return { kind: 'nominal', name };
  if (/^[a-z][\w$]*$/.test(name)) {
    throw new ConstraintSyntaxError(expression, name, `unrecognized type keyword '${name}'`);
  }
  throw new ConstraintSyntaxError(expression, name, `malformed type name '${name}'`);
}

function splitTokens(input: string | readonly string[]): string[] {
  const parts: readonly string[] = typeof input === 'string' ? [input] : input;
  return parts.flatMap((part) => part.split('|'));
}

export function dropSubsumed(tokens: TypeToken[]): TypeToken[] {
  const subsumed = new Set<string>();
  for (const token of tokens) {
    if (token.kind === 'pseudo') {
      for (const name of PSEUDO_SUBSUMES[token.name] ?? []) subsumed.add(name);
    }
  }
  if (subsumed.size === 0) return tokens;
  return tokens.filter((token) => token.kind === 'nominal' || !subsumed.has(token.name));
}

/**
 * Parses a constraint expression. A list of names is treated as if its
 * elements were joined with '|'; an empty list imposes no constraint.
 *
 * @throws ConstraintSyntaxError On an empty, duplicate, unknown or malformed token.
 */
export function parseTypeSpec(input: string | readonly string[]): ParsedTypeSpec {
  const expression = typeof input === 'string' ? input : input.join('|');
  if (typeof input !== 'string' && input.length === 0) return ANY;

  const tokens: TypeToken[] = [];
  const seen = new Set<string>();

  const push = (name: string): void => {
    const token = classifyTypeName(name, expression);
    const key = tokenKey(token);
    if (seen.has(key)) {
      throw new ConstraintSyntaxError(expression, name, `duplicate type '${name}'`);
    }
    seen.add(key);
    tokens.push(token);
  };

  for (const raw of splitTokens(input)) {
    const part = raw.trim();
    if (part.startsWith('?')) {
      const inner = part.slice(1).trim();
      if (inner === '') {
        throw new ConstraintSyntaxError(expression, '', 'empty type name');
      }
      push(inner);
      push('null');
    } else if (part === '') {
      throw new ConstraintSyntaxError(expression, '', 'empty type name');
    } else {
      push(part);
    }
  }

  if (tokens.some((token) => token.kind === 'pseudo' && token.name === 'mixed')) return ANY;

  return { anyOk: false, tokens: dropSubsumed(tokens) };
}
