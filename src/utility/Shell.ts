/**
 * Shell Utility - Run external programs with proper error handling
 *
 * Programs are spawned directly with an argument vector (no `bash -c`), so
 * values such as image paths are passed through untouched.
 */

import { spawn } from "node:child_process";
import { Logger } from "./Logger";

export interface ShellResult {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	command: string;
}

export interface ShellOptions {
	timeout?: number; // Timeout in milliseconds (default: 30000, 0 disables)
	onStdout?: (line: string) => void; // Callback for each stdout line
}

export type CommandRunner = (
	file: string,
	args: readonly string[],
	options?: ShellOptions,
) => Promise<ShellResult>;

/**
 * Printable form of a command line, for logs and error messages
 */
export const formatCommand = (file: string, args: readonly string[]): string =>
	[file, ...args]
		.map((part) => (part === "" || /[\s"'\\$`]/.test(part) ? JSON.stringify(part) : part))
		.join(" ");

const forEachLine = (text: string, callback: (line: string) => void): void => {
	for (const line of text.split("\n")) {
		if (line.trim()) callback(line);
	}
};

export class Shell {
	private static logger = Logger.getInstance();

	private constructor() {
		// Static utility class
	}

	/**
	 * Execute a program asynchronously
	 *
	 * Never rejects: spawn failures and timeouts resolve with `exitCode: -1`.
	 */
	static async execute(
		file: string,
		args: readonly string[] = [],
		options: ShellOptions = {},
	): Promise<ShellResult> {
		const { timeout = 30000, onStdout } = options;

		const command = formatCommand(file, args);
		this.logger.debug(`Executing: ${command}`);

		return new Promise((resolve) => {
			const proc = spawn(file, [...args], { stdio: ["ignore", "pipe", "pipe"] });

			let stdout = "";
			let stderr = "";
			let completed = false;
			let timeoutHandle: NodeJS.Timeout | undefined;

			const finish = (result: Omit<ShellResult, "stdout" | "stderr" | "command"> & { stderr?: string }): void => {
				if (completed) return;
				completed = true;
				if (timeoutHandle) clearTimeout(timeoutHandle);
				resolve({
					exitCode: result.exitCode,
					stdout,
					stderr: result.stderr ?? stderr,
					timedOut: result.timedOut,
					command,
				});
			};

			if (timeout > 0) {
				timeoutHandle = setTimeout(() => {
					if (completed) return;
					proc.kill("SIGTERM");
					this.logger.warn(`Command timed out after ${timeout}ms: ${command}`);
					finish({
						exitCode: -1,
						stderr: stderr || `Timed out after ${timeout}ms`,
						timedOut: true,
					});
				}, timeout);
			}

			proc.stdout.on("data", (data: Buffer) => {
				const text = data.toString();
				stdout += text;
				if (onStdout) forEachLine(text, onStdout);
			});

			proc.stderr.on("data", (data: Buffer) => {
				stderr += data.toString();
			});

			proc.on("close", (code, signal) => {
				// killed by a signal: no exit code
				finish({ exitCode: code ?? (signal ? -1 : 0), timedOut: false });
			});

			proc.on("error", (err) => {
				this.logger.error(`Command error: ${err.message}`);
				finish({ exitCode: -1, stderr: err.message, timedOut: false });
			});
		});
	}
}
