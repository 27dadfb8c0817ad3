/**
 * @fileoverview Detailed help text for klocfix CLI commands
 */

const HELP_TEXT = {
  main: `
klocfix - Detect and remediate MISRA/Klocwork-style violations in C sources

USAGE:
    klocfix <command> [options]

COMMANDS:
    fix <path>          Detect violations and apply engine patches
    scan <path>         Detect violations only; nothing is sent or written
    rules               List the rule catalog
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Workspace holding .klocfix.yaml (default: current directory)
    --json              Print machine-readable output on stdout

EXIT CODES:
    0   The run finished, whatever each file's outcome
    1   The run could not proceed (configuration, catalog, every file failed)
    2   Invalid command line

For more information on a specific command, run:
    klocfix help <command>
`,

  fix: `
klocfix fix - Detect violations and apply engine patches

USAGE:
    klocfix fix <file-or-directory> [options]

OPTIONS:
    -m, --mode <mode>       STRICT (default), IMPROVE or ADVISE
    -o, --output <dir>      Artifact directory (default: klocfix-out)
    -c, --config <file>     Config file (default: <workspace>/.klocfix.yaml)
    --kb <dir>              Knowledge base of <RULE.ID>.md files
    --engine <name>         claude (default) or codex
    --model <id>            Model id passed to the engine CLI
    --no-classify           Skip the confirmation classifier
    --verify <command>      Check each patched file; {file} is replaced by its path
    --max-rules <n>         Distinct rules remediated per file (default: 10)
    --max-files <n>         Files processed concurrently (default: 4)
    --file-timeout <ms>     Abandon a file after this long (default: no limit)
    --quiet                 No progress bar
    --json                  Print the run report on stdout

MODES:
    STRICT   Only lines inside a violation span may change
    IMPROVE  Nearby edits are allowed
    ADVISE   Nothing is written; suggestions go to <run>/advisory/

ARTIFACTS:
    <output>/<run-id>/report.json
    <output>/<run-id>/patches/<file>.patch
    <output>/<run-id>/full_repo.patch
    <output>/<run-id>/advisory/<file>.suggested.patch
    <output>/<run-id>/modified/<file>

EXAMPLES:
    klocfix fix src/
    klocfix fix src/driver.c --mode IMPROVE
    klocfix fix src/ --verify "gcc -fsyntax-only {file}"
`,

  scan: `
klocfix scan - Detect violations without remediating

USAGE:
    klocfix scan <file-or-directory> [options]

OPTIONS:
    -c, --config <file>     Config file (default: <workspace>/.klocfix.yaml)
    --kb <dir>              Knowledge base of <RULE.ID>.md files
    --engine <name>         claude (default) or codex, for the classifier
    --model <id>            Model id passed to the engine CLI
    --no-classify           Pattern detection only; the engine is never called
    --json                  Print violations as JSON

EXAMPLES:
    klocfix scan src/ --no-classify
    klocfix scan src/driver.c --json
`,

  rules: `
klocfix rules - List the rule catalog

USAGE:
    klocfix rules [options]

OPTIONS:
    --kb <dir>              Knowledge base of <RULE.ID>.md files
    --json                  Print the rules as JSON

Rules are listed in catalog order, which breaks ties between rules of the
same severity.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getCommandHelp(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
