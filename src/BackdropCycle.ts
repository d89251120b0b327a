/**
 * backdrop-cycle - XFCE backdrop list rotation
 *
 * Owns the current topology snapshot and runs one command per invocation:
 * - query the saved list, mode and per-slot images
 * - cycle images from the saved list
 * - save a new list, switch backdrop mode, set images explicitly
 */

import { config } from "./config";
import { Logger } from "./utility/Logger";
import { nodeFileSystem, type FileSystem } from "./utility/FileSystem";
import { createRandomSource, type RandomSource } from "./utility/Random";
import { XfconfCli } from "./features/xfconf/XfconfCli";
import type { ConfigService } from "./features/xfconf/types";
import { BackdropSettings } from "./features/backdrop/BackdropSettings";
import {
	describeError,
	IOError,
	isBackdropError,
	NoImageError,
	ValidationError,
} from "./features/backdrop/errors";
import { ImageListLoader } from "./features/backdrop/ImageListLoader";
import { ImageSelector } from "./features/backdrop/ImageSelector";
import { RotationOrchestrator, type RotationPhase } from "./features/backdrop/RotationOrchestrator";
import { assignExplicit, splitTokens } from "./features/backdrop/SlotAssigner";
import { canonicalSlots, TopologyResolver } from "./features/backdrop/TopologyResolver";
import {
	formatSlot,
	type RotationReport,
	type Slot,
	type SlotOutcome,
	type TopologySnapshot,
} from "./features/backdrop/types";

export interface CommandOutcome {
	output: string;
	/** False when anything the command attempted failed, per-slot writes included. */
	success: boolean;
}

export interface BackdropCycleOptions {
	service?: ConfigService;
	fs?: FileSystem;
	random?: RandomSource;
	channel?: string;
	onPhase?: (phase: RotationPhase, slot?: Slot) => void;
}

export class BackdropCycle {
	private logger = Logger.getInstance();
	private readonly settings: BackdropSettings;
	private readonly loader: ImageListLoader;
	private readonly selector: ImageSelector;
	private readonly orchestrator: RotationOrchestrator;
	private readonly fs: FileSystem;

	private constructor(
		private readonly resolver: TopologyResolver,
		private snapshot: TopologySnapshot,
		service: ConfigService,
		options: BackdropCycleOptions,
	) {
		this.fs = options.fs ?? nodeFileSystem;
		this.settings = new BackdropSettings(service, options.channel ?? config.channel);
		this.loader = new ImageListLoader(this.fs);
		this.selector = new ImageSelector(this.fs, options.random ?? createRandomSource(config.randomSeed));
		this.orchestrator = new RotationOrchestrator({
			settings: this.settings,
			loader: this.loader,
			selector: this.selector,
			onPhase: options.onPhase,
		});
	}

	/**
	 * Resolve the topology and build an instance around it.
	 * Rejects with NoTopologyError, TransportError or SchemaError.
	 */
	static async create(options: BackdropCycleOptions = {}): Promise<BackdropCycle> {
		const service = options.service ?? XfconfCli.getInstance();
		const resolver = new TopologyResolver(service, options.channel ?? config.channel);
		const snapshot = await resolver.resolve();
		return new BackdropCycle(resolver, snapshot, service, options);
	}

	getSnapshot(): TopologySnapshot {
		return this.snapshot;
	}

	// ==================== Query ====================

	/**
	 * Saved list, mode and current image of every slot. Reads only.
	 */
	async query(): Promise<CommandOutcome> {
		const { monitors, workspaceCount, mode } = this.snapshot;
		const singleWorkspace = mode.kind === "single" ? mode.workspace : undefined;

		const lines = [await this.describeListPath(), "Current image file(s) set:"];

		for (const monitor of monitors) {
			lines.push(` ${monitor} : Mode = ${mode.kind === "single" ? "single" : "separate"}`);
			for (let workspace = 0; workspace < workspaceCount; workspace++) {
				const marker = workspace === singleWorkspace ? "*" : " ";
				lines.push(`\tworkspace ${workspace}${marker}: ${await this.describeSlotImage({ monitor, workspace })}`);
			}
		}

		lines.push(`Single backdrop mode = ${mode.kind === "single"}`);
		if (singleWorkspace !== undefined) {
			lines.push(`Single backdrop mode workspace = ${singleWorkspace}`);
		}

		return { output: lines.join("\n"), success: true };
	}

	// ==================== Rotation ====================

	/**
	 * Random images from the saved list for every active slot
	 */
	async cycle(): Promise<CommandOutcome> {
		let listPath: string;
		try {
			listPath = await this.settings.getListPath();
		} catch (error) {
			return this.failure("Could not get list", error);
		}

		this.logger.info(`Cycling backdrops from ${listPath}`);

		try {
			return formatReport(await this.orchestrator.rotate(this.snapshot, listPath));
		} catch (error) {
			return this.failure("Failed", error);
		}
	}

	// ==================== List ====================

	/**
	 * Save a new list file after checking it yields at least one image
	 */
	async setList(listPath: string, cycle: boolean): Promise<CommandOutcome> {
		const lines = [await this.describeListPath(), `Setting list = ${listPath}`];

		try {
			await this.validateList(listPath);
			await this.settings.setListPath(listPath);
		} catch (error) {
			const failed = this.failure(`Error setting list path to (${listPath})`, error);
			return { output: [...lines, failed.output].join("\n"), success: false };
		}

		this.logger.info(`Saved list file ${listPath}`);

		if (!cycle) {
			return { output: lines.join("\n"), success: true };
		}

		return appendOutcome(lines, await this.cycle());
	}

	private async validateList(listPath: string): Promise<void> {
		if (!(await this.fs.exists(listPath))) {
			throw new IOError(listPath, { cause: "no such file" });
		}

		const candidates = await this.loader.load(listPath);

		try {
			await this.selector.pick(candidates);
		} catch (error) {
			if (error instanceof NoImageError) {
				throw new ValidationError(`${listPath} does not name any existing image`, listPath, {
					cause: error,
				});
			}
			throw error;
		}
	}

	// ==================== Mode ====================

	/**
	 * Switch between single and per-workspace backdrops. A workspace index
	 * outside the discovered range is reported and left unchanged.
	 */
	async setMode(single: boolean, workspace: number | undefined, cycle: boolean): Promise<CommandOutcome> {
		const lines: string[] = [];
		let success = true;
		let number = workspace;

		if (number !== undefined && (number < 0 || number >= this.snapshot.workspaceCount)) {
			lines.push(
				`Workspace index (${number}) outside valid range [0..${this.snapshot.workspaceCount}). Not changing it.`,
			);
			number = undefined;
			success = false;
		}

		try {
			await this.settings.setMode(single, number);
		} catch (error) {
			lines.push(this.failure("Error setting backdrop mode", error).output);
			return { output: lines.join("\n"), success: false };
		}

		lines.push(
			`Backdrop mode = ${single ? "single" : "separate"}${number !== undefined ? ` (workspace ${number})` : ""}`,
		);

		if (!cycle) {
			return { output: lines.join("\n"), success };
		}

		try {
			this.snapshot = await this.resolver.refresh();
		} catch (error) {
			lines.push(this.failure("Error refreshing desktop settings", error).output);
			return { output: lines.join("\n"), success: false };
		}

		const rotated = appendOutcome(lines, await this.cycle());
		return { output: rotated.output, success: success && rotated.success };
	}

	// ==================== Explicit images ====================

	/**
	 * `a.jpg::b.jpg` style assignment onto the canonical slot order
	 */
	async setImages(collated: string, repeat: boolean): Promise<CommandOutcome> {
		const tokens = splitTokens(collated);
		const slots = canonicalSlots(this.snapshot);
		const assignments = assignExplicit(tokens, slots, repeat);

		if (slots.length === 0 && tokens.some((token) => token !== "")) {
			this.logger.warn("No monitor/workspace slots discovered; images not set");
			return { output: "No monitor/workspace slots discovered; images not set", success: false };
		}

		if (assignments.length === 0) {
			return { output: "No images to set", success: true };
		}

		return formatReport(await this.orchestrator.apply(assignments));
	}

	// ==================== Helpers ====================

	private async describeListPath(): Promise<string> {
		try {
			return `Current list file is : ${await this.settings.getListPath()}`;
		} catch (error) {
			if (!isBackdropError(error)) throw error;
			return `Could not get list, ${describeError(error)}`;
		}
	}

	private async describeSlotImage(slot: Slot): Promise<string> {
		try {
			return await this.settings.getSlotImage(slot);
		} catch (error) {
			if (!isBackdropError(error)) throw error;
			return `<unavailable: ${describeError(error)}>`;
		}
	}

	private failure(context: string, error: unknown): CommandOutcome {
		if (!isBackdropError(error)) {
			throw error;
		}
		this.logger.error(`${context}: ${describeError(error)}`);
		return { output: `${context}: ${describeError(error)}`, success: false };
	}
}

export function formatOutcome(outcome: SlotOutcome): string {
	if (outcome.status === "applied") {
		return `${formatSlot(outcome.slot)} : ${outcome.image}`;
	}
	const image = outcome.image ? `${outcome.image} ` : "";
	return `${formatSlot(outcome.slot)} : ${image}failed: ${describeError(outcome.error)}`;
}

export function formatReport(report: RotationReport): CommandOutcome {
	const lines = report.outcomes.map(formatOutcome);

	if (report.outcomes.length === 0) {
		lines.push("No slots to update");
	}
	if (report.failed > 0) {
		lines.push(`${report.failed} of ${report.outcomes.length} slot(s) failed`);
	}

	return { output: lines.join("\n"), success: report.failed === 0 };
}

const appendOutcome = (lines: string[], outcome: CommandOutcome): CommandOutcome => ({
	output: [...lines, outcome.output].join("\n"),
	success: outcome.success,
});
