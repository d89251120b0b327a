import { Logger } from "../../utility/Logger";
import type { BackdropSettings } from "./BackdropSettings";
import { describeError, isBackdropError } from "./errors";
import type { ImageListLoader } from "./ImageListLoader";
import type { ImageSelector } from "./ImageSelector";
import { samplePool } from "./SlotAssigner";
import {
	formatSlot,
	type RotationReport,
	type Slot,
	type SlotAssignment,
	type SlotOutcome,
	type TopologySnapshot,
} from "./types";

export type RotationPhase = "idle" | "loading-pool" | "selecting" | "writing" | "done";

export interface RotationOrchestratorDeps {
	settings: BackdropSettings;
	loader: ImageListLoader;
	selector: ImageSelector;
	onPhase?: (phase: RotationPhase, slot?: Slot) => void;
}

/**
 * Drives one rotation: load the pool, then select and write slot by slot.
 *
 * A failed selection or write is recorded and the run moves on to the next
 * slot. Writes are never retried.
 */
export class RotationOrchestrator {
	private logger = Logger.getInstance();
	private readonly settings: BackdropSettings;
	private readonly loader: ImageListLoader;
	private readonly selector: ImageSelector;
	private readonly onPhase?: (phase: RotationPhase, slot?: Slot) => void;

	constructor(deps: RotationOrchestratorDeps) {
		this.settings = deps.settings;
		this.loader = deps.loader;
		this.selector = deps.selector;
		this.onPhase = deps.onPhase;
	}

	/**
	 * Rejects with IOError when the list cannot be read; nothing is written then.
	 */
	async rotate(snapshot: TopologySnapshot, listPath: string): Promise<RotationReport> {
		this.enter("idle");
		this.enter("loading-pool");
		const pool = await this.loader.load(listPath);

		const outcomes: SlotOutcome[] = [];

		const picks = samplePool(snapshot, pool, this.selector, (slot) => this.enter("selecting", slot));

		for await (const pick of picks) {
			if (!pick.ok) {
				this.logger.warn(`${formatSlot(pick.slot)}: ${describeError(pick.error)}`);
				outcomes.push({ slot: pick.slot, status: "failed", stage: "select", error: pick.error });
				continue;
			}

			outcomes.push(await this.write(pick.slot, pick.image));
		}

		return this.finish(outcomes);
	}

	/**
	 * Writes explicit assignments in order
	 */
	async apply(assignments: readonly SlotAssignment[]): Promise<RotationReport> {
		this.enter("idle");
		const outcomes: SlotOutcome[] = [];
		for (const { slot, image } of assignments) {
			outcomes.push(await this.write(slot, image));
		}
		return this.finish(outcomes);
	}

	private async write(slot: Slot, image: string): Promise<SlotOutcome> {
		this.enter("writing", slot);
		try {
			await this.settings.setSlotImage(slot, image);
			this.logger.info(`${formatSlot(slot)} : ${image}`);
			return { slot, status: "applied", image };
		} catch (error) {
			if (!isBackdropError(error)) {
				throw error;
			}
			this.logger.warn(`${formatSlot(slot)}: write failed: ${describeError(error)}`);
			return { slot, status: "failed", stage: "write", image, error };
		}
	}

	private finish(outcomes: SlotOutcome[]): RotationReport {
		this.enter("done");
		const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
		return {
			outcomes,
			applied: outcomes.length - failed,
			failed,
		};
	}

	private enter(phase: RotationPhase, slot?: Slot): void {
		this.logger.debug(`Rotation phase: ${phase}${slot ? ` (${formatSlot(slot)})` : ""}`);
		this.onPhase?.(phase, slot);
	}
}
