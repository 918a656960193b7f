import { DEFAULT_CONCURRENCY } from "./batch";

export interface CliConfig {
	input: string | null;
	output: string | null;
	backup: boolean;
	concurrency: number;
	verbose: boolean;
	/** Text to standardize directly; null when no `--text` was given. */
	text: string | null;
}

type Environment = Record<string, string | undefined>;

const VALUE_FLAGS = new Set(["--concurrency", "--text"]);
const BOOLEAN_FLAGS = new Set(["--no-backup", "--verbose"]);

const readArg = (argv: readonly string[], flag: string): string | null => {
	const index = argv.indexOf(flag);
	if (index === -1) return null;
	const value = argv[index + 1];
	if (value === undefined || value.startsWith("--")) return "";
	return value;
};

function positionals(argv: readonly string[]): string[] {
	const values: string[] = [];
	for (let index = 0; index < argv.length; index += 1) {
		const arg = argv[index] ?? "";
		if (VALUE_FLAGS.has(arg)) {
			const next = argv[index + 1];
			if (next !== undefined && !next.startsWith("--")) index += 1;
			continue;
		}
		if (BOOLEAN_FLAGS.has(arg) || arg.startsWith("--")) continue;
		values.push(arg);
	}
	return values;
}

function parseConcurrency(raw: string | null | undefined): number | null {
	if (raw === null || raw === undefined || !/^\d+$/.test(raw)) return null;
	const value = Number.parseInt(raw, 10);
	return value > 0 ? value : null;
}

function isTruthy(raw: string | undefined): boolean {
	return raw !== undefined && ["1", "true", "yes"].includes(raw.toLowerCase());
}

/**
 * Build the CLI configuration from arguments (without the node and script
 * entries) and environment defaults. Flags win over the environment.
 */
export function resolveCliConfig(
	argv: readonly string[],
	env: Environment = {},
): CliConfig {
	const [input, output] = positionals(argv);
	const concurrency =
		parseConcurrency(readArg(argv, "--concurrency")) ??
		parseConcurrency(env.SCRIPTURE_REFS_CONCURRENCY) ??
		DEFAULT_CONCURRENCY;

	return {
		input: input ?? null,
		output: output ?? null,
		backup: !argv.includes("--no-backup"),
		concurrency,
		verbose: argv.includes("--verbose") || isTruthy(env.SCRIPTURE_REFS_VERBOSE),
		text: readArg(argv, "--text"),
	};
}
