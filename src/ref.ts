import type { CopyableHandle, Pointer } from './pointer.js';

/**
 * A single allocation holding a value.
 *
 * A `Ref` has a stable identity and stands in for a raw address: owning
 * handles hand out their `Ref` from `get()`, and comparisons between handles
 * compare `Ref` identities.
 *
 * A `Ref` is also the non-owning handle kind. It is its own address, copying
 * it aliases the same allocation, and releasing it does nothing.
 *
 * @template T - The type of the held value
 *
 * @example
 * ```typescript
 * const counter = ref(0);
 * const view = NonNull.of(counter);
 *
 * view.get().current += 1;
 * counter.current; // 1
 * ```
 */
export class Ref<T> implements Pointer<T>, CopyableHandle<Ref<T>> {
	constructor(public current: T) {}

	/**
	 * Returns this reference; a raw reference is its own address.
	 */
	get(): Ref<T> {
		return this;
	}

	/**
	 * Returns this reference; copies of a raw reference alias one allocation.
	 */
	copy(): Ref<T> {
		return this;
	}

	/**
	 * A non-owning reference has nothing to release.
	 */
	reset(): void {
		return;
	}
}

/**
 * Allocates a new `Ref` holding `value`.
 */
export function ref<T>(value: T): Ref<T> {
	return new Ref(value);
}
