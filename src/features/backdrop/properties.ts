import type { Slot } from "./types";

/** Everything per monitor and workspace lives below this path. */
export const SCREEN_PREFIX = "/backdrop/screen0";

export const LIST_PATH_PROPERTY = `${SCREEN_PREFIX}/monitor0/image-path`;
export const SINGLE_WORKSPACE_MODE_PROPERTY = "/backdrop/single-workspace-mode";
export const SINGLE_WORKSPACE_NUMBER_PROPERTY = "/backdrop/single-workspace-number";

export const COLOR_STYLE_LEAF = "color-style";
export const LAST_IMAGE_LEAF = "last-image";

const SLOT_PROPERTY = /^\/backdrop\/screen0\/monitor(.+)\/workspace(\d+)\/([^/]+)$/;

export interface SlotProperty {
	monitor: string;
	workspace: number;
	leaf: string;
}

/**
 * Split `/backdrop/screen0/monitor<M>/workspace<W>/<leaf>` into its parts
 */
export function parseSlotProperty(property: string): SlotProperty | null {
	const match = SLOT_PROPERTY.exec(property);
	if (!match) {
		return null;
	}
	return {
		monitor: match[1],
		workspace: Number.parseInt(match[2], 10),
		leaf: match[3],
	};
}

export const slotProperty = (slot: Slot, leaf: string): string =>
	`${SCREEN_PREFIX}/monitor${slot.monitor}/workspace${slot.workspace}/${leaf}`;

export const lastImageProperty = (slot: Slot): string => slotProperty(slot, LAST_IMAGE_LEAF);
