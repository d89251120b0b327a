/**
 * backdrop-cycle configuration
 *
 * Environment driven, validated once at start-up.
 */

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import * as dotenv from "dotenv";

dotenv.config();

const BackdropConfigSchema = z.object({
	// Environment
	nodeEnv: z
		.enum(["development", "production", "test"])
		.default("development"),

	// Logging
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logDir: z.string().min(1),
	logToFile: z.boolean().default(true),

	// xfconf
	xfconfCommand: z.string().min(1).default("xfconf-query"),
	channel: z.string().min(1).default("xfce4-desktop"),
	callTimeoutMs: z.number().int().positive().default(2000),

	// Image selection
	randomSeed: z.number().int().optional(),
});

export type BackdropConfig = z.infer<typeof BackdropConfigSchema>;

const defaultLogDir = (): string =>
	path.join(os.homedir(), ".local", "state", "backdrop-cycle", "log");

const parseFlag = (value: string | undefined): boolean | undefined => {
	if (value === undefined || value === "") return undefined;
	return !["0", "false", "no", "off"].includes(value.toLowerCase());
};

const parseOptionalInt = (value: string | undefined): number | undefined =>
	value === undefined || value === "" ? undefined : Number.parseInt(value, 10);

function loadConfig(): BackdropConfig {
	const rawConfig = {
		nodeEnv: process.env.NODE_ENV || "development",
		logLevel: process.env.LOG_LEVEL?.toLowerCase() || "info",
		logDir: process.env.BACKDROP_LOG_DIR || defaultLogDir(),
		logToFile: parseFlag(process.env.BACKDROP_LOG_TO_FILE),
		xfconfCommand: process.env.XFCONF_QUERY_BIN || "xfconf-query",
		channel: process.env.BACKDROP_CHANNEL || "xfce4-desktop",
		callTimeoutMs: Number.parseInt(process.env.XFCONF_TIMEOUT_MS || "2000", 10),
		randomSeed: parseOptionalInt(process.env.BACKDROP_SEED),
	};

	try {
		return BackdropConfigSchema.parse(rawConfig);
	} catch (error) {
		if (error instanceof z.ZodError) {
			console.error("Configuration validation failed:");
			for (const issue of error.issues) {
				console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
			}
		}
		throw error;
	}
}

export const config = loadConfig();

// Test runs never write session logs
export const isTest = config.nodeEnv === "test";
