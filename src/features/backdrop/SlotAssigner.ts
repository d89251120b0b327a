import { isBackdropError } from "./errors";
import type { ImageSelector } from "./ImageSelector";
import { activeWorkspaces } from "./TopologyResolver";
import type { Slot, SlotAssignment, SlotPick, TopologySnapshot } from "./types";

/**
 * `a.jpg::b.jpg` → ["a.jpg", "", "b.jpg"]; empty tokens are holes
 */
export const splitTokens = (collated: string): string[] => collated.split(":");

/**
 * Positional mapping of image tokens onto slots.
 *
 * Token i targets slot i. An empty token still consumes its slot but produces
 * no assignment. Without `repeat`, slots past the last token are untouched;
 * with `repeat`, the tokens wrap around until every slot is covered.
 */
export function assignExplicit(
	tokens: readonly string[],
	slots: readonly Slot[],
	repeat: boolean,
): SlotAssignment[] {
	if (tokens.length === 0) {
		return [];
	}

	const span = repeat ? slots.length : Math.min(tokens.length, slots.length);
	const assignments: SlotAssignment[] = [];

	for (let i = 0; i < span; i++) {
		const image = tokens[i % tokens.length];
		if (image !== "") {
			assignments.push({ slot: slots[i], image });
		}
	}

	return assignments;
}

/**
 * Slots a pool rotation touches: every monitor × every active workspace
 */
export function rotationSlots(snapshot: TopologySnapshot): Slot[] {
	const workspaces = activeWorkspaces(snapshot);
	return snapshot.monitors.flatMap((monitor) =>
		workspaces.map((workspace) => ({ monitor, workspace })),
	);
}

/**
 * One independent pick per rotation slot, drawn only when the consumer asks
 * for the next one. Images may repeat across slots; a failed pick is yielded
 * for its slot and the next slot is still sampled.
 */
export async function* samplePool(
	snapshot: TopologySnapshot,
	pool: readonly string[],
	selector: ImageSelector,
	onSlot?: (slot: Slot) => void,
): AsyncGenerator<SlotPick, void, undefined> {
	for (const slot of rotationSlots(snapshot)) {
		onSlot?.(slot);
		try {
			yield { slot, ok: true, image: await selector.pick(pool) };
		} catch (error) {
			if (!isBackdropError(error)) {
				throw error;
			}
			yield { slot, ok: false, error };
		}
	}
}

export async function rotateFromPool(
	snapshot: TopologySnapshot,
	pool: readonly string[],
	selector: ImageSelector,
): Promise<SlotPick[]> {
	const picks: SlotPick[] = [];
	for await (const pick of samplePool(snapshot, pool, selector)) {
		picks.push(pick);
	}
	return picks;
}
