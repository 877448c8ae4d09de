export interface CLIArgs {
  showConfigPath: boolean;
  help: boolean;
  /** Arguments that are not flags, in order. */
  positionals: string[];
}

/**
 * Parse command line arguments.
 *
 * @param argv - Process arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): CLIArgs {
  return {
    showConfigPath: argv.includes("--config-path") || argv.includes("-c"),
    help: argv.includes("--help") || argv.includes("-h"),
    positionals: argv.filter((arg) => !arg.startsWith("-")),
  };
}
