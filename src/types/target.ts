/**
 * Directive and backup target type definitions
 */

export type DirectiveKind = "path" | "folder";

interface DirectiveBase {
  /** Raw directory text, before `~` and `$VAR` expansion */
  dir: string;
  /** 1-based line number in the directive file */
  line: number;
}

export interface PathDirective extends DirectiveBase {
  kind: "path";
}

/** Expands to one target per immediate subdirectory of `dir` */
export interface FolderDirective extends DirectiveBase {
  kind: "folder";
}

export type Directive = PathDirective | FolderDirective;

export interface BackupTarget {
  /** Final path component of `sourceDirectory`; the archive name stem */
  name: string;
  sourceDirectory: string;
  /** Directive line the target came from */
  line: number;
}

export interface ResolvedTargets {
  targets: BackupTarget[];
  warnings: string[];
}
