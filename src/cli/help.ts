import type { Output } from "../types";
import { color, VERSION } from "./ui";

export function printHelp(output: Output): void {
  output.line(`
${color.bold("cachette")} ${color.dim(`v${VERSION}`)} - Encrypted directory backups with tar and age

${color.dim("USAGE:")}
  cachette [OPTIONS]                 Back up every configured directory
  cachette --check                   List the directories a backup would archive
  cachette --restore <file>          Restore an archive into the current directory
  cachette --prune <days>            Delete archives older than <days> days

${color.dim("OPTIONS:")}
  -c, --config <path>     Directive file (default: ~/.cachetterc or $CACHETTE_CONFIG)
      --dry-run           With --prune: list what would be deleted
      --verbose           Diagnostic output on stderr
  -h, --help              Show this help message
  -V, --version           Show version

${color.dim("DIRECTIVES:")}
  path <dir>              Back up <dir> as one archive (alias: directory)
  folder <dir>            Back up each subdirectory of <dir> as its own archive
  <dir>                   Same as path
  # comment               Ignored, as are blank lines; ~ and $VAR are expanded

${color.dim("ENVIRONMENT:")}
  AGE_PASSPHRASE          Passphrase to use instead of prompting
  CACHETTE_CONFIG         Directive file location

${color.dim("EXAMPLES:")}
  cachette                                   ${color.dim("# Writes <name>-YYYY-MM-DD-HHMMSS.tar.gz.age files here")}
  cachette --restore docs-2025-01-31-093000.tar.gz.age
  cachette --prune 30 --dry-run
`);
}

export function printVersion(output: Output): void {
  output.line(`cachette v${VERSION}`);
}
