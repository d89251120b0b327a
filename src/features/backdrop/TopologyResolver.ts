import { config } from "../../config";
import { Logger } from "../../utility/Logger";
import type { ConfigService } from "../xfconf/types";
import { readBoolean, readInteger } from "../xfconf/values";
import { describeError, isBackdropError, NoTopologyError } from "./errors";
import {
	COLOR_STYLE_LEAF,
	LAST_IMAGE_LEAF,
	parseSlotProperty,
	SCREEN_PREFIX,
	SINGLE_WORKSPACE_MODE_PROPERTY,
	SINGLE_WORKSPACE_NUMBER_PROPERTY,
} from "./properties";
import type { BackdropMode, Slot, TopologySnapshot } from "./types";

export const DEFAULT_MODE: BackdropMode = { kind: "single", workspace: 0 };

/**
 * Discovers monitors, workspace count and backdrop mode from the flat
 * property namespace of the desktop channel.
 *
 * Workspace count is taken from the first monitor only; all monitors are
 * assumed to expose the same number of workspaces.
 */
export class TopologyResolver {
	private logger = Logger.getInstance();

	constructor(
		private readonly service: ConfigService,
		private readonly channel: string = config.channel,
	) {}

	async resolve(): Promise<TopologySnapshot> {
		const properties = await this.service.list(this.channel, SCREEN_PREFIX);
		const parsed = properties.flatMap((property) => {
			const slot = parseSlotProperty(property);
			return slot ? [slot] : [];
		});

		const monitors = [
			...new Set(
				parsed.filter((p) => p.leaf === COLOR_STYLE_LEAF).map((p) => p.monitor),
			),
		].sort();

		if (monitors.length === 0) {
			throw new NoTopologyError(SCREEN_PREFIX);
		}

		const representative = monitors[0];
		const workspaceCount = new Set(
			parsed
				.filter((p) => p.monitor === representative && p.leaf === LAST_IMAGE_LEAF)
				.map((p) => p.workspace),
		).size;

		const mode = await this.resolveMode();

		this.logger.debug(
			`Topology: monitors [${monitors.join(", ")}], ${workspaceCount} workspace(s), mode ${formatMode(mode)}`,
		);

		return Object.freeze({
			monitors: Object.freeze(monitors),
			workspaceCount,
			mode,
		});
	}

	/**
	 * A fresh snapshot; the previous one is left as it was.
	 */
	refresh(): Promise<TopologySnapshot> {
		return this.resolve();
	}

	/**
	 * Both mode properties are optional. When either cannot be read the
	 * desktop is treated as single mode on workspace 0.
	 */
	async resolveMode(): Promise<BackdropMode> {
		const single = await this.lookup(() =>
			readBoolean(this.service, this.channel, SINGLE_WORKSPACE_MODE_PROPERTY),
		);
		const workspace = await this.lookup(() =>
			readInteger(this.service, this.channel, SINGLE_WORKSPACE_NUMBER_PROPERTY),
		);

		if (single === undefined || workspace === undefined) {
			return DEFAULT_MODE;
		}

		const mode: BackdropMode = single
			? { kind: "single", workspace: Math.max(0, workspace) }
			: { kind: "per-workspace" };
		return Object.freeze(mode);
	}

	private async lookup<T>(read: () => Promise<T>): Promise<T | undefined> {
		try {
			return await read();
		} catch (error) {
			if (!isBackdropError(error)) {
				throw error;
			}
			this.logger.debug(`Single workspace setting unavailable (${describeError(error)})`);
			return undefined;
		}
	}
}

export const formatMode = (mode: BackdropMode): string =>
	mode.kind === "single" ? `single(${mode.workspace})` : "per-workspace";

/**
 * Every slot in canonical order: monitors ascending, then workspaces ascending
 */
export function canonicalSlots(snapshot: TopologySnapshot): Slot[] {
	return snapshot.monitors.flatMap((monitor) =>
		range(snapshot.workspaceCount).map((workspace) => ({ monitor, workspace })),
	);
}

/**
 * Workspaces a pool rotation writes to
 */
export function activeWorkspaces(snapshot: TopologySnapshot): number[] {
	return snapshot.mode.kind === "single"
		? [snapshot.mode.workspace]
		: range(snapshot.workspaceCount);
}

const range = (count: number): number[] => Array.from({ length: count }, (_, index) => index);
