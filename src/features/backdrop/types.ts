import type { BackdropError } from "./errors";

export type MonitorId = string;

/**
 * One (monitor, workspace) pair owning one backdrop image
 */
export interface Slot {
	readonly monitor: MonitorId;
	readonly workspace: number;
}

/**
 * `single`: every monitor rotates only the given workspace.
 * `per-workspace`: every discovered workspace rotates independently.
 */
export type BackdropMode =
	| { readonly kind: "single"; readonly workspace: number }
	| { readonly kind: "per-workspace" };

/**
 * Point-in-time record of the desktop layout. Never mutated; a refresh
 * produces a new snapshot.
 */
export interface TopologySnapshot {
	/** Sorted ascending, no duplicates. */
	readonly monitors: readonly MonitorId[];
	readonly workspaceCount: number;
	readonly mode: BackdropMode;
}

export interface SlotAssignment {
	readonly slot: Slot;
	readonly image: string;
}

export type SlotPick =
	| { readonly slot: Slot; readonly ok: true; readonly image: string }
	| { readonly slot: Slot; readonly ok: false; readonly error: BackdropError };

export type SlotOutcome =
	| { readonly slot: Slot; readonly status: "applied"; readonly image: string }
	| {
			readonly slot: Slot;
			readonly status: "failed";
			readonly stage: "select" | "write";
			readonly image?: string;
			readonly error: BackdropError;
	  };

export interface RotationReport {
	readonly outcomes: readonly SlotOutcome[];
	readonly applied: number;
	readonly failed: number;
}

export const formatSlot = (slot: Slot): string =>
	`monitor${slot.monitor}, workspace-${slot.workspace}`;
