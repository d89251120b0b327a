import { Logger } from "../../utility/Logger";
import { nodeFileSystem, type FileSystem } from "../../utility/FileSystem";

/**
 * List file to candidate sequence.
 *
 * Lines are trimmed; lines starting with `#` are comments. Blank lines stay
 * in the result as empty candidates (they never pass an existence probe).
 */
export function parseImageList(text: string): string[] {
	if (text === "") {
		return [];
	}

	const lines = text.replace(/\r?\n$/, "").split(/\r?\n/);
	return lines.map((line) => line.trim()).filter((line) => !line.startsWith("#"));
}

export class ImageListLoader {
	private logger = Logger.getInstance();

	constructor(private readonly fs: FileSystem = nodeFileSystem) {}

	/**
	 * Rejects with IOError when the file cannot be read
	 */
	async load(path: string): Promise<string[]> {
		const candidates = parseImageList(await this.fs.readText(path));
		this.logger.debug(`Loaded ${candidates.length} candidate(s) from ${path}`);
		return candidates;
	}
}
