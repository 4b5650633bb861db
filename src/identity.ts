/**
 * Stable identity ordinals for objects.
 *
 * JavaScript exposes no addresses, so every object that takes part in an
 * address or owner comparison is numbered the first time it is seen. The
 * ordinal never changes for the lifetime of the object and is never reused,
 * which gives a total order consistent across every comparison form.
 */
const ordinals = new WeakMap<object, number>();
let nextOrdinal = 1;

/**
 * Returns the identity ordinal of an object; `0` stands for null.
 */
export function addressOf(target: object | null | undefined): number {
	if (target === null || target === undefined) {
		return 0;
	}
	let ordinal = ordinals.get(target);
	if (ordinal === undefined) {
		ordinal = nextOrdinal++;
		ordinals.set(target, ordinal);
	}
	return ordinal;
}

export type Ordering = -1 | 0 | 1;

/**
 * Three-way comparison of two identities.
 */
export function compareAddresses(
	a: object | null | undefined,
	b: object | null | undefined
): Ordering {
	const left = addressOf(a);
	const right = addressOf(b);
	if (left === right) return 0;
	return left < right ? -1 : 1;
}
