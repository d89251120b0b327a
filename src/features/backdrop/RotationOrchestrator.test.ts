import { describe, expect, it } from "vitest";

import { desktopProperties, MemoryConfigService, MemoryFileSystem, scriptedRandom } from "../../testing/fakes";
import { BackdropSettings } from "./BackdropSettings";
import { IOError } from "./errors";
import { ImageListLoader } from "./ImageListLoader";
import { ImageSelector } from "./ImageSelector";
import { RotationOrchestrator, type RotationPhase } from "./RotationOrchestrator";
import type { Slot, TopologySnapshot } from "./types";

const CHANNEL = "xfce4-desktop";

const snapshot: TopologySnapshot = {
	monitors: ["A", "B"],
	workspaceCount: 2,
	mode: { kind: "per-workspace" },
};

function setup(files: Record<string, string>, draws: number[] = []) {
	const service = new MemoryConfigService(CHANNEL, desktopProperties(["A", "B"], 2));
	const fs = new MemoryFileSystem(files);
	const phases: string[] = [];
	const orchestrator = new RotationOrchestrator({
		settings: new BackdropSettings(service, CHANNEL),
		loader: new ImageListLoader(fs),
		selector: new ImageSelector(fs, scriptedRandom(draws)),
		onPhase: (phase: RotationPhase, slot?: Slot) => {
			phases.push(slot ? `${phase}:${slot.monitor}${slot.workspace}` : phase);
		},
	});
	return { service, fs, phases, orchestrator };
}

describe("backdrop/RotationOrchestrator", () => {
	it("writes one sampled image per active slot", async () => {
		const { service, orchestrator } = setup(
			{ "/list.txt": "/img/1.jpg\n/img/2.jpg\n", "/img/1.jpg": "", "/img/2.jpg": "" },
			[0, 1, 1, 0],
		);

		const report = await orchestrator.rotate(snapshot, "/list.txt");

		expect(report).toMatchObject({ applied: 4, failed: 0 });
		expect(service.sets().map((call) => [call.property, call.value])).toEqual([
			["/backdrop/screen0/monitorA/workspace0/last-image", "/img/1.jpg"],
			["/backdrop/screen0/monitorA/workspace1/last-image", "/img/2.jpg"],
			["/backdrop/screen0/monitorB/workspace0/last-image", "/img/2.jpg"],
			["/backdrop/screen0/monitorB/workspace1/last-image", "/img/1.jpg"],
		]);
	});

	it("only rotates the single workspace in single mode", async () => {
		const { service, orchestrator } = setup({ "/list.txt": "/img/1.jpg", "/img/1.jpg": "" });

		await orchestrator.rotate({ ...snapshot, mode: { kind: "single", workspace: 1 } }, "/list.txt");

		expect(service.sets().map((call) => call.property)).toEqual([
			"/backdrop/screen0/monitorA/workspace1/last-image",
			"/backdrop/screen0/monitorB/workspace1/last-image",
		]);
	});

	it("walks idle, loading, then select and write per slot, then done", async () => {
		const { phases, orchestrator } = setup({ "/list.txt": "/img/1.jpg", "/img/1.jpg": "" });

		await orchestrator.rotate({ ...snapshot, mode: { kind: "single", workspace: 0 } }, "/list.txt");

		expect(phases).toEqual([
			"idle",
			"loading-pool",
			"selecting:A0",
			"writing:A0",
			"selecting:B0",
			"writing:B0",
			"done",
		]);
	});

	it("fails fast with IOError when the list is unreadable", async () => {
		const { service, orchestrator } = setup({});

		await expect(orchestrator.rotate(snapshot, "/nope.txt")).rejects.toBeInstanceOf(IOError);
		expect(service.sets()).toEqual([]);
	});

	it("records selection failures for every slot without aborting", async () => {
		const { service, orchestrator } = setup({ "/list.txt": "/img/gone.jpg\n" });

		const report = await orchestrator.rotate({ ...snapshot, mode: { kind: "single", workspace: 0 } }, "/list.txt");

		expect(report).toMatchObject({ applied: 0, failed: 2 });
		expect(report.outcomes).toMatchObject([
			{ slot: { monitor: "A", workspace: 0 }, status: "failed", stage: "select", error: { kind: "no-image" } },
			{ slot: { monitor: "B", workspace: 0 }, status: "failed", stage: "select", error: { kind: "no-image" } },
		]);
		expect(service.sets()).toEqual([]);
	});

	it("continues past a failed write and does not retry it", async () => {
		const { service, orchestrator } = setup({ "/list.txt": "/img/1.jpg", "/img/1.jpg": "" });
		service.failOn("/backdrop/screen0/monitorA/workspace1/last-image");

		const report = await orchestrator.rotate(snapshot, "/list.txt");

		expect(report).toMatchObject({ applied: 3, failed: 1 });
		expect(report.outcomes[1]).toMatchObject({
			slot: { monitor: "A", workspace: 1 },
			status: "failed",
			stage: "write",
			image: "/img/1.jpg",
			error: { kind: "transport" },
		});
		expect(service.sets().map((call) => call.property)).toEqual([
			"/backdrop/screen0/monitorA/workspace0/last-image",
			"/backdrop/screen0/monitorA/workspace1/last-image",
			"/backdrop/screen0/monitorB/workspace0/last-image",
			"/backdrop/screen0/monitorB/workspace1/last-image",
		]);
		expect(service.value(CHANNEL, "/backdrop/screen0/monitorA/workspace1/last-image")).toBe("/old/A-1.jpg");
	});

	it("applies explicit assignments in order", async () => {
		const { service, orchestrator } = setup({});

		const report = await orchestrator.apply([
			{ slot: { monitor: "A", workspace: 0 }, image: "a.jpg" },
			{ slot: { monitor: "B", workspace: 0 }, image: "b.jpg" },
		]);

		expect(report).toMatchObject({ applied: 2, failed: 0 });
		expect(service.value(CHANNEL, "/backdrop/screen0/monitorA/workspace0/last-image")).toBe("a.jpg");
		expect(service.value(CHANNEL, "/backdrop/screen0/monitorB/workspace0/last-image")).toBe("b.jpg");
		expect(service.value(CHANNEL, "/backdrop/screen0/monitorA/workspace1/last-image")).toBe("/old/A-1.jpg");
	});
});
