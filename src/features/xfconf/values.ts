import { z } from "zod";
import { SchemaError } from "../backdrop/errors";
import type { ConfigService } from "./types";

const StringValue = z.string();

const BooleanValue = z
	.string()
	.trim()
	.toLowerCase()
	.pipe(z.enum(["true", "false"]))
	.transform((value) => value === "true");

const IntegerValue = z
	.string()
	.trim()
	.regex(/^[+-]?\d+$/, "Expected an integer")
	.transform((value) => Number.parseInt(value, 10));

async function read<T>(
	service: ConfigService,
	channel: string,
	property: string,
	schema: z.ZodType<T, z.ZodTypeDef, string>,
	typeName: string,
): Promise<T> {
	const raw = await service.get(channel, property);
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		throw new SchemaError(
			`Property ${property} is not a ${typeName}: ${JSON.stringify(raw)}`,
			property,
			{ cause: parsed.error },
		);
	}
	return parsed.data;
}

export const readString = (service: ConfigService, channel: string, property: string): Promise<string> =>
	read(service, channel, property, StringValue, "string");

export const readBoolean = (service: ConfigService, channel: string, property: string): Promise<boolean> =>
	read(service, channel, property, BooleanValue, "boolean");

export const readInteger = (service: ConfigService, channel: string, property: string): Promise<number> =>
	read(service, channel, property, IntegerValue, "integer");
