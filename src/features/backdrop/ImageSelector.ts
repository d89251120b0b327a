import { Logger } from "../../utility/Logger";
import { nodeFileSystem, type FileSystem } from "../../utility/FileSystem";
import { mathRandom, type RandomSource } from "../../utility/Random";
import { NoImageError } from "./errors";

/**
 * Random pick of an existing file from a candidate pool.
 *
 * Draws are uniform over the candidates still in play. A candidate whose
 * probe fails is dropped for the rest of the call, so every distinct
 * candidate is probed at most once.
 */
export class ImageSelector {
	private logger = Logger.getInstance();

	constructor(
		private readonly fs: FileSystem = nodeFileSystem,
		private readonly random: RandomSource = mathRandom,
	) {}

	async pick(candidates: readonly string[]): Promise<string> {
		const remaining = [...new Set(candidates)].sort();
		const examined = remaining.length;

		while (remaining.length > 0) {
			const index = this.random.nextInt(remaining.length);
			const candidate = remaining[index];

			if (await this.fs.exists(candidate)) {
				return candidate;
			}

			this.logger.debug(`Skipping missing image ${JSON.stringify(candidate)}`);
			remaining.splice(index, 1);
		}

		throw new NoImageError(examined);
	}
}
