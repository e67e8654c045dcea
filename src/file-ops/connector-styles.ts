/**
 * Connector styles for the rendered tree.
 */
import { BUILT_IN_STYLES, TREE, type BuiltInStyleName } from '../constants';

import { TreeError } from './errors';

/**
 * The four fragments a tree line is made of.
 * - `branch` / `end`: connector before a non-last / last sibling
 * - `vertical` / `space`: prefix fragment under a non-last / last sibling
 */
export interface StyleSpec {
  readonly space: string;
  readonly vertical: string;
  readonly branch: string;
  readonly end: string;
}

const DEFAULT_VERTICAL_GLYPH = '│';

/** Width in code points; every connector glyph we ship is single-width */
export function visualWidth(text: string): number {
  return [...text].length;
}

/**
 * Build a style from its two connectors. `space` and `vertical` are padded to
 * the wider connector so continuation columns line up under the names.
 */
export function connectorStyler(branch: string, end: string, verticalGlyph = DEFAULT_VERTICAL_GLYPH): StyleSpec {
  const width = Math.max(visualWidth(branch), visualWidth(end), 1);
  return Object.freeze({
    space: ' '.repeat(width),
    vertical: verticalGlyph + ' '.repeat(Math.max(width - visualWidth(verticalGlyph), 0)),
    branch,
    end,
  });
}

function builtInStyle(name: BuiltInStyleName, indent: number): StyleSpec {
  switch (name) {
    case 'classic': {
      return connectorStyler(`├${'─'.repeat(indent)} `, `└${'─'.repeat(indent)} `);
    }
    case 'dash': {
      return connectorStyler(`|${'-'.repeat(indent)} `, `\`${'-'.repeat(indent)} `, '|');
    }
    case 'arrow': {
      const shaft = '─'.repeat(indent - 1);
      return connectorStyler(`├${shaft}> `, `└${shaft}> `);
    }
    case 'plus': {
      return connectorStyler(`+${'-'.repeat(indent)} `, `\\${'-'.repeat(indent)} `, '|');
    }
  }
}

export function normalizeIndent(indent: number): number {
  if (!Number.isFinite(indent)) return TREE.DEFAULT_INDENT;
  return Math.min(Math.max(Math.trunc(indent), TREE.MIN_INDENT), TREE.MAX_INDENT);
}

/**
 * Name → StyleSpec mapping seeded with the built-in styles.
 * Read-only during a traversal; callers may register more between runs.
 */
export class StyleRegistry {
  private readonly styles = new Map<string, StyleSpec>();
  private readonly registered = new Set<string>();
  readonly indent: number;

  constructor(indent: number = TREE.DEFAULT_INDENT) {
    this.indent = normalizeIndent(indent);
    for (const name of BUILT_IN_STYLES) {
      this.styles.set(name, builtInStyle(name, this.indent));
    }
  }

  register(name: string, branch: string, end: string, verticalGlyph?: string): StyleSpec {
    const spec = connectorStyler(branch, end, verticalGlyph);
    this.styles.set(name, spec);
    this.registered.add(name);
    return spec;
  }

  resolve(name: string): StyleSpec {
    const spec = this.styles.get(name);
    if (!spec) {
      throw new TreeError('UNKNOWN_STYLE', `Unknown style '${name}'. Available styles: ${this.names().join(', ')}`, { style: name });
    }
    return spec;
  }

  has(name: string): boolean {
    return this.styles.has(name);
  }

  names(): string[] {
    return [...this.styles.keys()];
  }

  /**
   * Copy of this registry at another indent. Built-ins are re-derived;
   * registered styles (including overridden built-ins) are carried over as-is.
   */
  withIndent(indent: number): StyleRegistry {
    const next = new StyleRegistry(indent);
    for (const name of this.registered) {
      const spec = this.styles.get(name);
      if (spec) {
        next.styles.set(name, spec);
        next.registered.add(name);
      }
    }
    return next;
  }
}
