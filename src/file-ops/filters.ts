/**
 * Name filters for the tree builder (no fs operations)
 */
import ignore from 'ignore';

import { TREE } from '../constants';

export type NamePredicate = (name: string) => boolean;

export interface FilterPair {
  readonly dirFilter: NamePredicate;
  readonly fileFilter: NamePredicate;
}

export interface NameFilterOptions {
  ignoreDirs?: Iterable<string>;
  ignoreFiles?: Iterable<string>;
  includeDirs?: Iterable<string>;
  includeFiles?: Iterable<string>;
}

interface PatternMatcher {
  ignores: (path: string) => boolean;
}

interface CompiledPatterns {
  matcher: PatternMatcher;
  literals: ReadonlySet<string>;
}

// `ignore` rejects dot-only names such as `...`; those only match literally
const DOTS_ONLY = /^\.+$/;

/**
 * Compile gitignore-style name patterns. Exact names match themselves;
 * globs such as `*.log` work too. Matching is case-sensitive.
 */
function compilePatterns(patterns: Iterable<string> | undefined): CompiledPatterns | null {
  const list = [...(patterns ?? [])].map((p) => p.trim()).filter(Boolean);
  if (list.length === 0) return null;
  return {
    matcher: ignore({ ignorecase: false }).add(list),
    literals: new Set(list),
  };
}

function matches(compiled: CompiledPatterns, name: string, asDirectory: boolean): boolean {
  // a listed name always matches itself, even when it reads as pattern syntax (`#x`, `!x`, `a[1]`)
  if (compiled.literals.has(name)) return true;
  if (asDirectory && compiled.literals.has(`${name}${TREE.DIRECTORY_MARKER}`)) return true;
  if (DOTS_ONLY.test(name)) return false;
  // directories are tested as `name/` so `build/` style patterns only hit directories
  return compiled.matcher.ignores(asDirectory ? `${name}${TREE.DIRECTORY_MARKER}` : name);
}

/**
 * A name is rejected when an ignore pattern matches it. Otherwise, when the
 * include list is non-empty, it must match an include pattern.
 */
function namePredicate(ignored: CompiledPatterns | null, included: CompiledPatterns | null, asDirectory: boolean): NamePredicate {
  return (name: string) => {
    if (ignored && matches(ignored, name, asDirectory)) return false;
    if (included && !matches(included, name, asDirectory)) return false;
    return true;
  };
}

/**
 * Build both predicates in one step. The returned pair is frozen; rebuilding
 * means calling this again and swapping the whole object.
 */
export function buildNameFilters(options: NameFilterOptions = {}): FilterPair {
  return Object.freeze({
    dirFilter: namePredicate(compilePatterns(options.ignoreDirs), compilePatterns(options.includeDirs), true),
    fileFilter: namePredicate(compilePatterns(options.ignoreFiles), compilePatterns(options.includeFiles), false),
  });
}

export const ALLOW_ALL: FilterPair = buildNameFilters();
