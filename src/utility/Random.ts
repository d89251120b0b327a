/**
 * Integer randomness for image selection
 */
export interface RandomSource {
	/** Uniform integer in [0, bound). */
	nextInt(bound: number): number;
}

export const mathRandom: RandomSource = {
	nextInt: (bound) => Math.floor(Math.random() * bound),
};

/**
 * Deterministic generator (mulberry32) for reproducible runs
 */
export function seededRandom(seed: number): RandomSource {
	let state = seed >>> 0;

	return {
		nextInt(bound: number): number {
			state = (state + 0x6d2b79f5) >>> 0;
			let t = state;
			t = Math.imul(t ^ (t >>> 15), t | 1);
			t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
			const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
			return Math.floor(unit * bound);
		},
	};
}

export const createRandomSource = (seed?: number): RandomSource =>
	seed === undefined ? mathRandom : seededRandom(seed);
