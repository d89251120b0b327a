import { config } from "../../config";
import type { ConfigService } from "../xfconf/types";
import { readString } from "../xfconf/values";
import {
	LIST_PATH_PROPERTY,
	lastImageProperty,
	SINGLE_WORKSPACE_MODE_PROPERTY,
	SINGLE_WORKSPACE_NUMBER_PROPERTY,
} from "./properties";
import type { Slot } from "./types";

/**
 * Typed reads and writes of the backdrop properties
 */
export class BackdropSettings {
	constructor(
		private readonly service: ConfigService,
		readonly channel: string = config.channel,
	) {}

	/** The saved list file (legacy single-property setting). */
	getListPath(): Promise<string> {
		return readString(this.service, this.channel, LIST_PATH_PROPERTY);
	}

	setListPath(listPath: string): Promise<void> {
		return this.service.set(this.channel, LIST_PATH_PROPERTY, listPath);
	}

	getSlotImage(slot: Slot): Promise<string> {
		return readString(this.service, this.channel, lastImageProperty(slot));
	}

	setSlotImage(slot: Slot, image: string): Promise<void> {
		return this.service.set(this.channel, lastImageProperty(slot), image);
	}

	/**
	 * Writes the mode flag, then the workspace number when one is given
	 */
	async setMode(single: boolean, workspace?: number): Promise<void> {
		await this.service.set(this.channel, SINGLE_WORKSPACE_MODE_PROPERTY, single);
		if (workspace !== undefined) {
			await this.service.set(this.channel, SINGLE_WORKSPACE_NUMBER_PROPERTY, workspace);
		}
	}
}
