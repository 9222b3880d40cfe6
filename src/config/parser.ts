/**
 * Directive file parsing
 *
 *   # comment
 *   path ~/Documents          one target
 *   directory $HOME/notes     alias of path
 *   folder ~/Projects         one target per immediate subdirectory
 *   ~/Pictures                bare line, same as path
 */

import type { Directive } from "../types";

const DIRECTIVE_PATTERN = /^(path|directory|folder)\s+(.*)$/;

export function isIgnoredLine(trimmed: string): boolean {
  return trimmed === "" || trimmed.startsWith("#");
}

/**
 * Parse one trimmed, non-ignored line. The keyword must be followed by
 * whitespace, so `pathology/` is a bare path.
 */
export function parseDirectiveLine(trimmed: string, line: number): Directive {
  const match = DIRECTIVE_PATTERN.exec(trimmed);
  const keyword = match?.[1];
  const dir = match?.[2]?.trim();

  if (keyword === undefined || dir === undefined || dir === "") {
    return { kind: "path", dir: trimmed, line };
  }

  return { kind: keyword === "folder" ? "folder" : "path", dir, line };
}

export function parseDirectives(content: string): Directive[] {
  const directives: Directive[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const trimmed = raw.trim();
    if (isIgnoredLine(trimmed)) return;
    directives.push(parseDirectiveLine(trimmed, index + 1));
  });

  return directives;
}
