export type CliCommand =
	| { kind: "help" }
	| { kind: "query" }
	| { kind: "cycle" }
	| { kind: "set-mode"; single: boolean; workspace?: number; cycle: boolean }
	| { kind: "set-list"; listPath: string; cycle: boolean }
	| { kind: "set-images"; images: string; repeat: boolean };

export type ParseResult =
	| { ok: true; command: CliCommand; hints: string[] }
	| { ok: false; message: string };

interface CliOptions {
	cycle: boolean;
	help: boolean;
	query: boolean;
	repeat: boolean;
	multiple: boolean;
	single: boolean;
	singleValue?: string;
	listFile?: string;
	free: string[];
}

type FlagName = "cycle" | "help" | "query" | "repeat" | "multiple";

const SHORT_FLAGS: Record<string, FlagName> = {
	c: "cycle",
	h: "help",
	q: "query",
	r: "repeat",
	m: "multiple",
};

const LONG_FLAGS: Record<string, FlagName> = {
	cycle: "cycle",
	help: "help",
	query: "query",
	repeat: "repeat",
	multiple: "multiple",
};

export const CYCLE_HINT = "Use -c to force a backdrop cycle.";

export function usage(program: string): string {
	return [
		`Usage: ${program} [options] [IMGFILE]:[IMGFILE]:.. [IMGFILE]:..`,
		"",
		"IMGFILES are mapped onto (monitor, workspace) pairs.",
		"The monitors are sorted as shown by the '-q' option.",
		"An empty entry leaves that pair unchanged.",
		"",
		"Options:",
		"    -c, --cycle         Cycle backgrounds from list",
		"    -h, --help          This help",
		"    -l, --listfile LISTFILE",
		"                        Set backdrop list file name",
		"    -m, --multiple      Use a separate backdrop on every workspace. Don't",
		"                        use together with '-s'",
		"    -s, --single [WORKSPACE]",
		"                        Use the backdrop of one workspace on all others",
		"    -q, --query         Query the current setting",
		"    -r, --repeat        When setting images directly, repeat the image list",
		"                        over all pairs",
		"",
		"Without options or images, backdrops are cycled from the saved list.",
	].join("\n");
}

class UsageError extends Error {}

/**
 * Option scan: short flags may be grouped (`-cq`), `-l` takes its value
 * attached or as the next argument. `-s` takes an optional value, attached
 * (`-s2`, `--single=2`) or as the next argument when that is not an option
 * (`-s 2`). `--` ends the options.
 */
function scan(argv: readonly string[]): CliOptions {
	const options: CliOptions = {
		cycle: false,
		help: false,
		query: false,
		repeat: false,
		multiple: false,
		single: false,
		free: [],
	};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];

		if (arg === "--") {
			options.free.push(...argv.slice(i + 1));
			break;
		}

		if (arg.startsWith("--")) {
			const [name, value] = splitLong(arg.slice(2));
			if (name === "listfile") {
				const listFile = value ?? argv[++i];
				if (listFile === undefined) {
					throw new UsageError("Argument to option 'listfile' missing");
				}
				options.listFile = listFile;
			} else if (name === "single") {
				options.single = true;
				options.singleValue = value ?? takeOptionalValue(argv, i);
				if (value === undefined && options.singleValue !== undefined) i++;
			} else if (Object.hasOwn(LONG_FLAGS, name) && value === undefined) {
				options[LONG_FLAGS[name]] = true;
			} else {
				throw new UsageError(`Unrecognized option: '${name}'`);
			}
			continue;
		}

		if (arg.startsWith("-") && arg.length > 1) {
			for (let j = 1; j < arg.length; j++) {
				const letter = arg[j];
				const rest = arg.slice(j + 1);

				if (letter === "l") {
					const listFile = rest !== "" ? rest : argv[++i];
					if (listFile === undefined) {
						throw new UsageError("Argument to option 'l' missing");
					}
					options.listFile = listFile;
					break;
				}

				if (letter === "s") {
					options.single = true;
					if (rest !== "") {
						options.singleValue = rest;
					} else {
						options.singleValue = takeOptionalValue(argv, i);
						if (options.singleValue !== undefined) i++;
					}
					break;
				}

				const flag = SHORT_FLAGS[letter];
				if (!flag) {
					throw new UsageError(`Unrecognized option: '${letter}'`);
				}
				options[flag] = true;
			}
			continue;
		}

		options.free.push(arg);
	}

	return options;
}

/** The argument after `index`, unless it is missing or another option. */
function takeOptionalValue(argv: readonly string[], index: number): string | undefined {
	const next = argv[index + 1];
	return next !== undefined && !next.startsWith("-") ? next : undefined;
}

function splitLong(body: string): [string, string | undefined] {
	const eq = body.indexOf("=");
	return eq === -1 ? [body, undefined] : [body.slice(0, eq), body.slice(eq + 1)];
}

/**
 * Turn argv (without node and script) into one command.
 *
 * Precedence: help, query, backdrop mode, list file, explicit images, and
 * otherwise a cycle from the saved list.
 */
export function parseCliArgs(argv: readonly string[]): ParseResult {
	let options: CliOptions;
	try {
		options = scan(argv);
	} catch (error) {
		if (error instanceof UsageError) {
			return { ok: false, message: error.message };
		}
		throw error;
	}

	if (options.help) {
		return { ok: true, command: { kind: "help" }, hints: [] };
	}

	if (options.query) {
		return { ok: true, command: { kind: "query" }, hints: [] };
	}

	const hints =
		!options.cycle && (options.single || options.multiple || options.listFile !== undefined)
			? [CYCLE_HINT]
			: [];

	if (options.single && options.multiple) {
		return { ok: false, message: "Specify one of -s or -m" };
	}

	if (options.single) {
		let workspace: number | undefined;
		if (options.singleValue !== undefined) {
			if (!/^[+-]?\d+$/.test(options.singleValue)) {
				return { ok: false, message: `Bad workspace index specified : '${options.singleValue}'` };
			}
			workspace = Number.parseInt(options.singleValue, 10);
		}
		return {
			ok: true,
			command: { kind: "set-mode", single: true, workspace, cycle: options.cycle },
			hints,
		};
	}

	if (options.multiple) {
		return { ok: true, command: { kind: "set-mode", single: false, cycle: options.cycle }, hints };
	}

	if (options.listFile !== undefined) {
		return {
			ok: true,
			command: { kind: "set-list", listPath: options.listFile, cycle: options.cycle },
			hints,
		};
	}

	if (options.free.length > 0) {
		return {
			ok: true,
			command: { kind: "set-images", images: options.free.join(":"), repeat: options.repeat },
			hints,
		};
	}

	return { ok: true, command: { kind: "cycle" }, hints };
}
