export const DEFAULT_SETTINGS_PATH = "blockfall.json" as const;

export type CliArgs = {
  configPath: string;
  seed?: string;
};

/**
 * Parse `--config <path>` and `--seed <string>` (also `--flag=value`).
 * Throws on unknown flags or a flag missing its value.
 */
export function parseArgs(argv: ReadonlyArray<string>): CliArgs {
  const out: CliArgs = { configPath: DEFAULT_SETTINGS_PATH };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }

    if (flag !== "--config" && flag !== "--seed") {
      throw new Error(`Unknown argument: ${arg}`);
    }
    if (value === undefined || value.length === 0) {
      throw new Error(`Missing value for ${flag}`);
    }

    if (flag === "--config") out.configPath = value;
    else out.seed = value;
  }

  return out;
}
