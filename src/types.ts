/**
 * Key of the method through which a wrapper gives up its inner value.
 * @internal
 */
export const ExtractKey: unique symbol = Symbol.for('strict-handles/Extract');

/**
 * A wrapper whose inner value can be pulled out by `take()`.
 *
 * Extraction consumes the wrapper: afterwards it is dead and any further use
 * of it is a contract violation.
 *
 * @template T - The type of the inner value
 */
export interface Extractable<T> {
	[ExtractKey](): T;
}

/**
 * A value that can exchange its contents with another of the same type.
 */
export interface Swappable<W> {
	swap(other: W): void;
}
