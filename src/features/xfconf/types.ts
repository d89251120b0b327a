export type XfconfValue = string | boolean | number;

/**
 * The configuration-service operations the backdrop core needs.
 *
 * Each call is one bounded round-trip. Failures reject with TransportError or
 * SchemaError.
 */
export interface ConfigService {
	/** Property paths under `prefix`, in no particular order. */
	list(channel: string, prefix: string): Promise<string[]>;
	/** Textual value of one property. */
	get(channel: string, property: string): Promise<string>;
	set(channel: string, property: string, value: XfconfValue): Promise<void>;
}
