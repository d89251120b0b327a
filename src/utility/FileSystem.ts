import { readFile, stat } from "node:fs/promises";
import { IOError } from "../features/backdrop/errors";

/**
 * The two filesystem questions the backdrop core asks
 */
export interface FileSystem {
	/** True for any existing entry. */
	exists(path: string): Promise<boolean>;
	/** Whole file as UTF-8; rejects with IOError. */
	readText(path: string): Promise<string>;
}

export const nodeFileSystem: FileSystem = {
	async exists(path: string): Promise<boolean> {
		try {
			await stat(path);
			return true;
		} catch {
			return false;
		}
	},

	async readText(path: string): Promise<string> {
		try {
			return await readFile(path, "utf8");
		} catch (error) {
			throw new IOError(path, { cause: error });
		}
	},
};
