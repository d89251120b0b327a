/**
 * File Logger with Rotating Logs
 *
 * Maintains up to 8 log files:
 * - current.log: Active log file for the current run
 * - archive/run-1.log to archive/run-7.log: Previous 7 runs (rotated)
 *
 * Every invocation of the CLI is one session, so a session log holds exactly
 * one command's trace.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { config, isTest } from "../config";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
};

const LEVEL_PREFIXES = ["[DEBUG]", "[INFO]", "[WARN]", "[ERROR]"];

export interface LoggerOptions {
	/** Directory holding current.log and archive/. `null` keeps no file at all. */
	logDir: string | null;
	minLevel?: LogLevel;
	maxLogs?: number;
}

export const parseLogLevel = (name: string): LogLevel =>
	LEVEL_NAMES[name.toLowerCase()] ?? LogLevel.INFO;

export class Logger {
	private static instance: Logger | undefined;
	private readonly logDir: string | null;
	private readonly archiveDir: string | null;
	private readonly currentLogPath: string | null;
	private readonly maxLogs: number;
	private readonly minLevel: LogLevel;
	private writeStream: fs.WriteStream | null = null;
	private streamReady = false;
	private fallbackFailed = false;

	constructor(options: LoggerOptions) {
		this.logDir = options.logDir;
		this.archiveDir = this.logDir ? path.join(this.logDir, "archive") : null;
		this.currentLogPath = this.logDir ? path.join(this.logDir, "current.log") : null;
		this.maxLogs = options.maxLogs ?? 8; // current.log + 7 archived logs
		this.minLevel = options.minLevel ?? LogLevel.INFO;

		if (this.logDir) {
			this.ensureLogDirectory();
			this.rotateLogsOnStartup();
			this.initializeWriteStream();
		}
	}

	static getInstance(): Logger {
		if (!Logger.instance) {
			Logger.instance = new Logger({
				logDir: config.logToFile && !isTest ? config.logDir : null,
				minLevel: parseLogLevel(config.logLevel),
			});
		}
		return Logger.instance;
	}

	/**
	 * Ensure log directory exists
	 */
	private ensureLogDirectory(): void {
		if (!this.logDir || !this.archiveDir) return;
		fs.mkdirSync(this.archiveDir, { recursive: true });
	}

	/**
	 * Rotate logs on startup
	 *
	 * current.log → archive/run-1.log
	 * archive/run-1.log → archive/run-2.log
	 * ...
	 * archive/run-7.log → deleted
	 */
	private rotateLogsOnStartup(): void {
		if (!this.currentLogPath || !this.archiveDir) return;

		if (fs.existsSync(this.currentLogPath)) {
			const oldestLog = path.join(this.archiveDir, `run-${this.maxLogs - 1}.log`);
			if (fs.existsSync(oldestLog)) {
				fs.unlinkSync(oldestLog);
			}

			for (let i = this.maxLogs - 2; i >= 1; i--) {
				const oldPath = path.join(this.archiveDir, `run-${i}.log`);
				const newPath = path.join(this.archiveDir, `run-${i + 1}.log`);
				if (fs.existsSync(oldPath)) {
					fs.renameSync(oldPath, newPath);
				}
			}

			fs.renameSync(this.currentLogPath, path.join(this.archiveDir, "run-1.log"));
		}

		const header = `backdrop-cycle session\nStarted: ${new Date().toISOString()}\n\n`;
		fs.writeFileSync(this.currentLogPath, header);
	}

	/**
	 * Initialize write stream for current.log
	 */
	private initializeWriteStream(): void {
		if (!this.currentLogPath) return;

		this.writeStream = fs.createWriteStream(this.currentLogPath, {
			flags: "a",
			encoding: "utf8",
		});

		this.writeStream.on("error", (error) => {
			// process.stderr directly, console may be intercepted
			process.stderr.write(`Log write stream error: ${error.message}\n`);
			this.streamReady = false;
		});

		this.streamReady = true;
	}

	private _log(level: LogLevel, message: string): void {
		if (level < this.minLevel || !this.currentLogPath) {
			return;
		}

		// HH:MM:SS.mmm
		const now = new Date();
		const hours = now.getHours().toString().padStart(2, "0");
		const minutes = now.getMinutes().toString().padStart(2, "0");
		const seconds = now.getSeconds().toString().padStart(2, "0");
		const millis = now.getMilliseconds().toString().padStart(3, "0");
		const timestamp = `${hours}:${minutes}:${seconds}.${millis}`;

		const logEntry = `[${timestamp}] ${LEVEL_PREFIXES[level]} ${message}\n`;

		if (this.writeStream && this.streamReady) {
			this.writeStream.write(logEntry);
			return;
		}

		try {
			fs.appendFileSync(this.currentLogPath, logEntry, "utf8");
		} catch (error) {
			if (!this.fallbackFailed) {
				this.fallbackFailed = true;
				process.stderr.write(`Log file unavailable: ${error}\n`);
			}
		}
	}

	debug(message: string): void {
		this._log(LogLevel.DEBUG, message);
	}

	info(message: string): void {
		this._log(LogLevel.INFO, message);
	}

	warn(message: string): void {
		this._log(LogLevel.WARN, message);
	}

	error(message: string): void {
		this._log(LogLevel.ERROR, message);
	}

	/**
	 * Alias for info
	 */
	log(message: string): void {
		this.info(message);
	}

	/**
	 * Get list of all log files (current + archived)
	 */
	getLogFiles(): string[] {
		if (!this.currentLogPath || !this.archiveDir) {
			return [];
		}

		const files: string[] = [];

		if (fs.existsSync(this.currentLogPath)) {
			files.push("current.log (ACTIVE)");
		}

		for (let i = 1; i < this.maxLogs; i++) {
			const logPath = path.join(this.archiveDir, `run-${i}.log`);
			if (fs.existsSync(logPath)) {
				const stats = fs.statSync(logPath);
				files.push(`archive/run-${i}.log (${stats.size} bytes, ${stats.mtime.toISOString()})`);
			}
		}

		return files;
	}

	/**
	 * End the write stream; resolves once pending entries are flushed.
	 */
	close(): Promise<void> {
		const stream = this.writeStream;
		this.writeStream = null;
		this.streamReady = false;

		if (!stream) {
			return Promise.resolve();
		}

		return new Promise((resolve) => {
			stream.end(() => resolve());
		});
	}
}

/**
 * Mirror console output into the log file
 */
export function interceptConsole(): void {
	const logger = Logger.getInstance();

	const originalLog = console.log;
	const originalError = console.error;
	const originalWarn = console.warn;

	console.log = (...args: unknown[]) => {
		logger.log(args.map((arg) => String(arg)).join(" "));
		originalLog.apply(console, args);
	};

	console.error = (...args: unknown[]) => {
		logger.error(args.map((arg) => String(arg)).join(" "));
		originalError.apply(console, args);
	};

	console.warn = (...args: unknown[]) => {
		logger.warn(args.map((arg) => String(arg)).join(" "));
		originalWarn.apply(console, args);
	};

	const shutdown = (exitCode: number) => (): void => {
		void logger.close().then(() => process.exit(exitCode));
	};

	process.on("SIGTERM", shutdown(143));
	process.on("SIGINT", shutdown(130));
	process.on("exit", () => {
		void logger.close();
	});
}
