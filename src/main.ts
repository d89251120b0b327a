#!/usr/bin/env tsx
/**
 * backdrop-cycle - rotate XFCE desktop backdrops from a list file
 *
 * Exit status: 0 success, 1 failed command or failed slot, 2 usage error.
 */

import * as path from "node:path";
import { BackdropCycle, type CommandOutcome } from "./BackdropCycle";
import { parseCliArgs, usage, type CliCommand } from "./cli/args";
import { describeError } from "./features/backdrop/errors";
import { Logger, interceptConsole } from "./utility/Logger";

interceptConsole();
const logger = Logger.getInstance();

const program = path.basename(process.argv[1] ?? "backdrop-cycle").replace(/\.[cm]?[jt]s$/, "");

async function run(command: Exclude<CliCommand, { kind: "help" }>): Promise<CommandOutcome> {
	const app = await BackdropCycle.create();

	switch (command.kind) {
		case "query":
			return app.query();
		case "set-mode":
			return app.setMode(command.single, command.workspace, command.cycle);
		case "set-list":
			return app.setList(command.listPath, command.cycle);
		case "set-images":
			return app.setImages(command.images, command.repeat);
		case "cycle":
			return app.cycle();
	}
}

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
	console.error(parsed.message);
	console.error(usage(program));
	process.exitCode = 2;
} else if (parsed.command.kind === "help") {
	console.log(usage(program));
} else {
	for (const hint of parsed.hints) {
		console.log(hint);
	}

	logger.info(`Running ${parsed.command.kind}`);

	try {
		const outcome = await run(parsed.command);
		console.log(outcome.output);
		process.exitCode = outcome.success ? 0 : 1;
	} catch (error) {
		logger.error(`Error: ${describeError(error)}`);
		console.error("Error:", describeError(error));
		process.exitCode = 1;
	}
}

await logger.close();
