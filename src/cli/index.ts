#!/usr/bin/env node

import { loadConfig, resolveCheckerOptions } from "../config/index.js";
import { checkComponent } from "../walker/index.js";

// ANSI colors (disabled if not TTY)
const isTTY = process.stdout.isTTY;
const c = {
  green: (s: string) => (isTTY ? `\x1b[32m${s}\x1b[0m` : s),
  red: (s: string) => (isTTY ? `\x1b[31m${s}\x1b[0m` : s),
  cyan: (s: string) => (isTTY ? `\x1b[36m${s}\x1b[0m` : s),
  dim: (s: string) => (isTTY ? `\x1b[2m${s}\x1b[0m` : s),
  bold: (s: string) => (isTTY ? `\x1b[1m${s}\x1b[0m` : s),
};

interface CliOptions {
  componentPath: string | undefined;
  configPath: string | undefined;
  /** --config given without a file */
  configMissing: boolean;
  quiet: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    componentPath: undefined,
    configPath: undefined,
    configMissing: false,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("--config=")) {
      options.configPath = arg.slice("--config=".length);
      options.configMissing = options.configPath === "";
    } else if (arg === "--config") {
      const value = args[i + 1];
      if (value === undefined || value === "" || value.startsWith("-")) {
        options.configMissing = true;
      } else {
        options.configPath = value;
        i++;
      }
    } else if (!arg.startsWith("-") && options.componentPath === undefined) {
      options.componentPath = arg;
    }
  }

  return options;
}

async function check(componentPath: string, configPath: string | undefined, quiet: boolean) {
  const config = await loadConfig(componentPath, configPath);
  const options = resolveCheckerOptions(config);
  const report = await checkComponent(componentPath, options);

  for (const violation of report.violations) {
    console.log(c.red(`ERROR: ${violation.message}`));
  }

  if (report.violations.length > 0) {
    if (!quiet) {
      console.log(
        c.red(
          `\n✗ ${report.violations.length} import violation(s) in ${report.filesChecked} files checked`
        )
      );
    }
    process.exitCode = 1;
    return;
  }

  if (!quiet) {
    console.log(c.green(`✓ No import violations (${report.filesChecked} files checked)`));
  }
}

function help() {
  console.log(`${c.bold("umbrella-check")} - Import hygiene for umbrella-header components

${c.bold("Usage:")} umbrella-check <component-path> [options]

Checks that every file under <component-path>/src imports only umbrella
headers or files of its own module, and that examples/ imports only
umbrella headers or other example files.

${c.bold("Options:")}
  ${c.cyan("--quiet, -q")}       Print violations only, useful for CI/hooks
  ${c.cyan("--config")} <file>   Configuration file (default: <component-path>/.umbrella-check.yaml)
  ${c.cyan("--help, -h")}        Show this help

${c.bold("Examples:")}
  ${c.dim("$")} umbrella-check components/Buttons
  ${c.dim("$")} umbrella-check components/Buttons --quiet
  ${c.dim("$")} umbrella-check components/Buttons --config=ci/umbrella-check.yaml
`);
}

// Main
const cli = parseArgs(process.argv.slice(2));

if (cli.help) {
  help();
} else if (cli.configMissing) {
  console.log(c.red(`✗ Missing value for --config`));
  console.log(c.dim(`\n  Usage: umbrella-check <component-path> --config <file>`));
  process.exit(1);
} else if (cli.componentPath === undefined) {
  console.log(c.red(`✗ Missing component path`));
  console.log(c.dim(`\n  Usage: umbrella-check <component-path>`));
  process.exit(1);
} else {
  check(cli.componentPath, cli.configPath, cli.quiet).catch((err: unknown) => {
    console.error(c.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  });
}
