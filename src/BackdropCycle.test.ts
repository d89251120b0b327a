import { describe, expect, it } from "vitest";

import { BackdropCycle } from "./BackdropCycle";
import { NoTopologyError } from "./features/backdrop/errors";
import type { XfconfValue } from "./features/xfconf/types";
import { desktopProperties, MemoryConfigService, MemoryFileSystem, scriptedRandom } from "./testing/fakes";

const CHANNEL = "xfce4-desktop";
const LIST = "/backdrop/screen0/monitor0/image-path";
const MODE = "/backdrop/single-workspace-mode";
const NUMBER = "/backdrop/single-workspace-number";

const IMAGES = {
	"/lists/main.txt": "# holiday\n/img/1.jpg\n/img/2.jpg\n",
	"/img/1.jpg": "",
	"/img/2.jpg": "",
};

async function setup(extra: Record<string, XfconfValue> = {}, draws: number[] = [], files: Record<string, string> = IMAGES) {
	const service = new MemoryConfigService(CHANNEL, desktopProperties(["A", "B"], 2, extra));
	const fs = new MemoryFileSystem(files);
	const app = await BackdropCycle.create({ service, fs, random: scriptedRandom(draws), channel: CHANNEL });
	return { service, fs, app };
}

describe("BackdropCycle", () => {
	it("refuses to start without a discoverable topology", async () => {
		const service = new MemoryConfigService(CHANNEL, { [LIST]: "/lists/main.txt" });

		await expect(BackdropCycle.create({ service, channel: CHANNEL })).rejects.toBeInstanceOf(NoTopologyError);
	});

	describe("query", () => {
		it("shows the list, mode and every slot image", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/main.txt", [MODE]: true, [NUMBER]: 1 });

			const outcome = await app.query();

			expect(outcome).toEqual({
				success: true,
				output: [
					"Current list file is : /lists/main.txt",
					"Current image file(s) set:",
					" A : Mode = single",
					"\tworkspace 0 : /old/A-0.jpg",
					"\tworkspace 1*: /old/A-1.jpg",
					" B : Mode = single",
					"\tworkspace 0 : /old/B-0.jpg",
					"\tworkspace 1*: /old/B-1.jpg",
					"Single backdrop mode = true",
					"Single backdrop mode workspace = 1",
				].join("\n"),
			});
			expect(service.sets()).toEqual([]);
		});

		it("reports what it could not read", async () => {
			const { service, app } = await setup({ [MODE]: false, [NUMBER]: 0 });
			service.failOn("/backdrop/screen0/monitorB/workspace1/last-image");

			const lines = (await app.query()).output.split("\n");

			expect(lines[0]).toBe(
				"Could not get list, SchemaError: Property /backdrop/screen0/monitor0/image-path is not set",
			);
			expect(lines[2]).toBe(" A : Mode = separate");
			expect(lines[7]).toBe(
				"\tworkspace 1 : <unavailable: TransportError: xfconf call for /backdrop/screen0/monitorB/workspace1/last-image timed out>",
			);
			expect(lines[8]).toBe("Single backdrop mode = false");
			expect(lines).toHaveLength(9);
		});
	});

	describe("cycle", () => {
		it("rotates the single-mode workspace of every monitor", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/main.txt" }, [1, 0]);

			const outcome = await app.cycle();

			expect(outcome).toEqual({
				success: true,
				output: "monitorA, workspace-0 : /img/2.jpg\nmonitorB, workspace-0 : /img/1.jpg",
			});
			expect(service.value(CHANNEL, "/backdrop/screen0/monitorA/workspace0/last-image")).toBe("/img/2.jpg");
			expect(service.value(CHANNEL, "/backdrop/screen0/monitorA/workspace1/last-image")).toBe("/old/A-1.jpg");
		});

		it("fails when no list is saved", async () => {
			const { app } = await setup();

			await expect(app.cycle()).resolves.toEqual({
				success: false,
				output: "Could not get list: SchemaError: Property /backdrop/screen0/monitor0/image-path is not set",
			});
		});

		it("fails when the saved list cannot be read", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/main.txt" }, [], {});

			await expect(app.cycle()).resolves.toEqual({
				success: false,
				output: "Failed: IOError: Could not read /lists/main.txt: ENOENT",
			});
			expect(service.sets()).toEqual([]);
		});

		it("reports per-slot failures and marks the run unsuccessful", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/main.txt" }, [0, 0]);
			service.failOn("/backdrop/screen0/monitorB/workspace0/last-image");

			await expect(app.cycle()).resolves.toEqual({
				success: false,
				output: [
					"monitorA, workspace-0 : /img/1.jpg",
					"monitorB, workspace-0 : /img/1.jpg failed: TransportError: xfconf call for /backdrop/screen0/monitorB/workspace0/last-image timed out",
					"1 of 2 slot(s) failed",
				].join("\n"),
			});
		});
	});

	describe("setList", () => {
		it("saves a list that names an existing image", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/old.txt" });

			const outcome = await app.setList("/lists/main.txt", false);

			expect(outcome).toEqual({
				success: true,
				output: "Current list file is : /lists/old.txt\nSetting list = /lists/main.txt",
			});
			expect(service.value(CHANNEL, LIST)).toBe("/lists/main.txt");
		});

		it("cycles from the new list when asked", async () => {
			const { app } = await setup({ [LIST]: "/lists/old.txt" }, [0, 0, 1]);

			const outcome = await app.setList("/lists/main.txt", true);

			expect(outcome.success).toBe(true);
			expect(outcome.output.split("\n").slice(2)).toEqual([
				"monitorA, workspace-0 : /img/1.jpg",
				"monitorB, workspace-0 : /img/2.jpg",
			]);
		});

		it("rejects a list without any existing image", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/old.txt" }, [], {
				...IMAGES,
				"/lists/bad.txt": "# nothing here\n/img/gone.jpg\n",
			});

			const outcome = await app.setList("/lists/bad.txt", true);

			expect(outcome).toEqual({
				success: false,
				output: [
					"Current list file is : /lists/old.txt",
					"Setting list = /lists/bad.txt",
					"Error setting list path to (/lists/bad.txt): ValidationError: /lists/bad.txt does not name any existing image",
				].join("\n"),
			});
			expect(service.value(CHANNEL, LIST)).toBe("/lists/old.txt");
			expect(service.sets()).toEqual([]);
		});

		it("rejects a list file that does not exist", async () => {
			const { service, app } = await setup({ [LIST]: "/lists/old.txt" });

			const outcome = await app.setList("/lists/none.txt", false);

			expect(outcome.success).toBe(false);
			expect(outcome.output.split("\n")[2]).toBe(
				"Error setting list path to (/lists/none.txt): IOError: Could not read /lists/none.txt: no such file",
			);
			expect(service.value(CHANNEL, LIST)).toBe("/lists/old.txt");
		});
	});

	describe("setMode", () => {
		it("does not write a workspace index outside the discovered range", async () => {
			const { service, app } = await setup();

			const outcome = await app.setMode(true, 5, false);

			expect(outcome).toEqual({
				success: false,
				output: "Workspace index (5) outside valid range [0..2). Not changing it.\nBackdrop mode = single",
			});
			expect(service.sets().map((call) => [call.property, call.value])).toEqual([[MODE, true]]);
		});

		it("writes single mode with its workspace", async () => {
			const { service, app } = await setup();

			const outcome = await app.setMode(true, 1, false);

			expect(outcome).toEqual({ success: true, output: "Backdrop mode = single (workspace 1)" });
			expect(service.sets().map((call) => [call.property, call.value])).toEqual([
				[MODE, true],
				[NUMBER, 1],
			]);
			// no refresh without a cycle
			expect(app.getSnapshot().mode).toEqual({ kind: "single", workspace: 0 });
		});

		it("refreshes the snapshot before cycling", async () => {
			const { app } = await setup({ [LIST]: "/lists/main.txt", [MODE]: true, [NUMBER]: 0 });
			const before = app.getSnapshot();

			const outcome = await app.setMode(false, undefined, true);

			expect(outcome).toEqual({
				success: true,
				output: [
					"Backdrop mode = separate",
					"monitorA, workspace-0 : /img/1.jpg",
					"monitorA, workspace-1 : /img/1.jpg",
					"monitorB, workspace-0 : /img/1.jpg",
					"monitorB, workspace-1 : /img/1.jpg",
				].join("\n"),
			});
			expect(app.getSnapshot()).not.toBe(before);
			expect(app.getSnapshot().mode).toEqual({ kind: "per-workspace" });
			expect(before.mode).toEqual({ kind: "single", workspace: 0 });
		});

		it("reports a failed mode write", async () => {
			const { service, app } = await setup();
			service.failOn(MODE);

			await expect(app.setMode(false, undefined, true)).resolves.toEqual({
				success: false,
				output: "Error setting backdrop mode: TransportError: xfconf call for /backdrop/single-workspace-mode timed out",
			});
		});
	});

	describe("setImages", () => {
		it("writes tokens positionally and skips holes", async () => {
			const { service, app } = await setup();

			const outcome = await app.setImages("a.jpg::b.jpg:", false);

			expect(outcome).toEqual({
				success: true,
				output: "monitorA, workspace-0 : a.jpg\nmonitorB, workspace-0 : b.jpg",
			});
			expect(service.sets().map((call) => call.property)).toEqual([
				"/backdrop/screen0/monitorA/workspace0/last-image",
				"/backdrop/screen0/monitorB/workspace0/last-image",
			]);
		});

		it("repeats tokens over all slots", async () => {
			const { service, app } = await setup();

			await app.setImages("a.jpg:b.jpg", true);

			expect(service.sets().map((call) => call.value)).toEqual(["a.jpg", "b.jpg", "a.jpg", "b.jpg"]);
		});

		it("fails when images are given but no workspace was discovered", async () => {
			const service = new MemoryConfigService(CHANNEL, {
				"/backdrop/screen0/monitorA/workspace0/color-style": 0,
			});
			const app = await BackdropCycle.create({ service, fs: new MemoryFileSystem(), channel: CHANNEL });

			await expect(app.setImages("a.jpg", false)).resolves.toEqual({
				success: false,
				output: "No monitor/workspace slots discovered; images not set",
			});
			expect(service.sets()).toEqual([]);
		});

		it("does nothing for an all-hole token string", async () => {
			const { service, app } = await setup();

			await expect(app.setImages("::", false)).resolves.toEqual({ success: true, output: "No images to set" });
			expect(service.sets()).toEqual([]);
		});
	});
});
