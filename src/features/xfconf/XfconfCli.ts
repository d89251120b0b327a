import { config } from "../../config";
import { Logger } from "../../utility/Logger";
import { Shell, type CommandRunner, type ShellResult } from "../../utility/Shell";
import { SchemaError, TransportError } from "../backdrop/errors";
import type { ConfigService, XfconfValue } from "./types";

export interface XfconfCliOptions {
	command?: string;
	timeout?: number;
	runner?: CommandRunner;
}

const MISSING_PROPERTY = /does not exist on channel/i;

/**
 * xfconf-query type name for a value
 */
export function xfconfType(value: XfconfValue): "string" | "bool" | "int" {
	if (typeof value === "boolean") return "bool";
	if (typeof value === "number") return "int";
	return "string";
}

/**
 * Map a finished xfconf-query call onto the error taxonomy.
 * Returns undefined for a successful call.
 */
export function toXfconfError(
	result: ShellResult,
	property: string,
): TransportError | SchemaError | undefined {
	if (result.exitCode === 0 && !result.timedOut) {
		return undefined;
	}

	const detail = result.stderr.trim();

	if (!result.timedOut && MISSING_PROPERTY.test(detail)) {
		return new SchemaError(`Property ${property} is not set`, property);
	}

	const reason = result.timedOut
		? "timed out"
		: `exited with status ${result.exitCode}${detail ? `: ${detail}` : ""}`;

	return new TransportError(
		`xfconf call for ${property} ${reason}`,
		result.command,
		result.exitCode,
		result.timedOut,
	);
}

/**
 * ConfigService backed by the `xfconf-query` client
 */
export class XfconfCli implements ConfigService {
	private static instance: XfconfCli | undefined;
	private logger = Logger.getInstance();
	private readonly command: string;
	private readonly timeout: number;
	private readonly runner: CommandRunner;

	constructor(options: XfconfCliOptions = {}) {
		this.command = options.command ?? config.xfconfCommand;
		this.timeout = options.timeout ?? config.callTimeoutMs;
		this.runner = options.runner ?? ((file, args, opts) => Shell.execute(file, args, opts));
	}

	static getInstance(): XfconfCli {
		if (!XfconfCli.instance) {
			XfconfCli.instance = new XfconfCli();
		}
		return XfconfCli.instance;
	}

	async list(channel: string, prefix: string): Promise<string[]> {
		const result = await this.call(prefix, ["-c", channel, "-p", prefix, "-l"]);
		return result.stdout
			.split("\n")
			.map((line) => line.trim())
			.filter((line) => line.startsWith("/"));
	}

	async get(channel: string, property: string): Promise<string> {
		const result = await this.call(property, ["-c", channel, "-p", property]);
		// xfconf-query terminates the value with one newline
		return result.stdout.replace(/\r?\n$/, "");
	}

	async set(channel: string, property: string, value: XfconfValue): Promise<void> {
		await this.call(property, [
			"-c",
			channel,
			"-p",
			property,
			"-n",
			"-t",
			xfconfType(value),
			"-s",
			String(value),
		]);
		this.logger.debug(`Set ${channel}:${property} = ${String(value)}`);
	}

	private async call(property: string, args: string[]): Promise<ShellResult> {
		const result = await this.runner(this.command, args, { timeout: this.timeout });
		const error = toXfconfError(result, property);
		if (error) {
			this.logger.debug(`${error.name}: ${error.message}`);
			throw error;
		}
		return result;
	}
}
