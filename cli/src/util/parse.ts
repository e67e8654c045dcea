import { InvalidArgumentError } from "commander";
import { z } from "zod";

import { TREE } from "../../../src/constants";
import { TreeError } from "../../../src/file-ops/errors";

const nameListSchema = z.array(z.string());

/**
 * Parse a bracketed list literal such as `['.git', '.idea']` or `[".git"]`.
 * Single-quoted items are rewritten to JSON strings; a trailing comma is allowed.
 */
export function parseListLiteral(raw: string): string[] {
  const jsonish = raw
    .trim()
    .replace(/'((?:[^'\\]|\\.)*)'/g, (_match, body: string) => JSON.stringify(body.replace(/\\'/g, "'")))
    .replace(/,\s*]$/, "]");

  let data: unknown;
  try {
    data = JSON.parse(jsonish);
  } catch {
    throw new TreeError("INVALID_FILTER_SYNTAX", `Invalid list syntax: ${raw}`, { input: raw });
  }

  const parsed = nameListSchema.safeParse(data);
  if (!parsed.success) {
    throw new TreeError("INVALID_FILTER_SYNTAX", `Invalid list syntax: ${raw}`, { input: raw });
  }
  return parsed.data;
}

/**
 * Normalize a variadic name option.
 * Supports both:
 *  - space-separated values: --ignore-dirs .git .idea
 *  - one list literal:       --ignore-dirs "['.git', '.idea']"
 */
export function parseNameList(values?: readonly string[]): string[] | undefined {
  if (!values || values.length === 0) return undefined;
  if (values.length === 1 && values[0].trimStart().startsWith("[")) {
    return parseListLiteral(values[0]);
  }
  return [...values];
}

export function parseIndent(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < TREE.MIN_INDENT || n > TREE.MAX_INDENT) {
    throw new InvalidArgumentError(`Indent must be an integer between ${TREE.MIN_INDENT} and ${TREE.MAX_INDENT}.`);
  }
  return n;
}
