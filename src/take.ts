import { ExtractKey, type Extractable, type Swappable } from './types.js';

/**
 * Pulls the inner value out of a wrapper, consuming the wrapper.
 *
 * This is the only way to transfer an exclusively-owned handle or a move-only
 * callable out of its wrapper. Re-wrapping the result moves it into a new
 * wrapper.
 *
 * @param wrapper - The wrapper to consume; it must not be used afterwards
 * @returns The inner handle or callable
 * @throws {ConsumedWrapperError} If the wrapper was already consumed and
 * contracts are enforced
 *
 * @example Moving an exclusive owner
 * ```typescript
 * const first = makeUnique(42);
 * const second = NonNull.of(take(first));
 *
 * second.deref(); // 42
 * ```
 */
export function take<T>(wrapper: Extractable<T>): T {
	return wrapper[ExtractKey]();
}

/**
 * Exchanges the contents of two wrappers. Both remain non-null.
 */
export function swap<W extends Swappable<W>>(a: W, b: W): void {
	a.swap(b);
}
