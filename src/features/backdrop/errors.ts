/**
 * Error taxonomy of the backdrop core.
 *
 * Every failure that crosses a module boundary is one of these classes; values
 * thrown by collaborators (child processes, fs, zod) are converted where they
 * enter, never passed through as-is.
 */

export type BackdropErrorKind =
	| "transport"
	| "schema"
	| "no-topology"
	| "no-image"
	| "io"
	| "validation";

export abstract class BackdropError extends Error {
	abstract readonly kind: BackdropErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** An xfconf call failed: timeout, non-zero exit or the client could not start. */
export class TransportError extends BackdropError {
	readonly kind = "transport";

	constructor(
		message: string,
		readonly command: string,
		readonly exitCode: number,
		readonly timedOut: boolean,
	) {
		super(message);
	}
}

/** A property was absent or its value did not have the expected type. */
export class SchemaError extends BackdropError {
	readonly kind = "schema";

	constructor(
		message: string,
		readonly property: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export class NoTopologyError extends BackdropError {
	readonly kind = "no-topology";

	constructor(readonly prefix: string) {
		super(`No monitor/workspace properties found under ${prefix}`);
	}
}

export class NoImageError extends BackdropError {
	readonly kind = "no-image";

	constructor(readonly examined: number) {
		super(
			examined === 0
				? "Could not pick an image: the list is empty"
				: `Could not pick an image: none of ${examined} candidate(s) exist`,
		);
	}
}

export class IOError extends BackdropError {
	readonly kind = "io";

	constructor(
		readonly path: string,
		options?: { cause?: unknown },
	) {
		super(`Could not read ${path}${causeSuffix(options?.cause)}`, options);
	}
}

/** A list file offered as the saved list yields no usable image. */
export class ValidationError extends BackdropError {
	readonly kind = "validation";

	constructor(
		message: string,
		readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

function causeSuffix(cause: unknown): string {
	if (cause instanceof Error) return `: ${cause.message}`;
	if (cause === undefined) return "";
	return `: ${String(cause)}`;
}

export const isBackdropError = (error: unknown): error is BackdropError =>
	error instanceof BackdropError;

/**
 * One-line rendering of any thrown value for reports and logs
 */
export function describeError(error: unknown): string {
	if (error instanceof BackdropError) return `${error.name}: ${error.message}`;
	if (error instanceof Error) return error.message;
	return String(error);
}
