import ansis from "ansis";

export function printHelp(): void {
  console.log(`
${ansis.bold("trun")} - run targets and their dependencies

${ansis.bold("Usage:")}
  trun [flags] <target|pattern>...

${ansis.bold("Targets:")}
  build                 Run build after everything it depends on
  test:*                Run every target matching test:*
  test:* !test:slow     Exclude a target from a pattern

${ansis.bold("Flags:")}
  -f, --file <path>     Configuration file (default: trun.toml, pyproject.toml, package.json)
  -p, --parser <id>     Configuration format: trun, pyproject, package-json
  -k, --keep-going      Keep running independent targets after a failure
  -n, --dry             Print commands instead of running them
  -s, --silent          Discard command output
  -i, --ignore-err      Treat failing commands as tolerated
      --shell           Run every command through the shell
  -j, --jobs <n>        Run up to n targets at once (default: 1)
  -q, --quiet           Suppress status output
  -l, --list            List targets
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix
  -h, --help            Show this help
  `);
}
