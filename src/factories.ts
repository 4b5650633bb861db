import { NonNull, type NonNullShared, type NonNullUnique } from './non-null.js';
import { Shared } from './shared.js';
import { type Deleter, Unique } from './unique.js';

/**
 * Allocates `value` under an exclusive owner and wraps the owner.
 *
 * @param value - The value to own
 * @param deleter - Destruction policy run when ownership ends
 *
 * @example
 * ```typescript
 * const socket = makeUnique(openSocket(), (s) => s.end());
 * socket.deref().write('ping');
 * socket.destroy(); // ends the socket
 * ```
 */
export function makeUnique<T>(
	value: T,
	deleter?: Deleter<NoInfer<T>>
): NonNullUnique<T> {
	return NonNull.of(Unique.of(value, deleter));
}

/**
 * Allocates `value` under a shared owner and wraps the owner.
 *
 * @param value - The value to own
 * @param deleter - Destruction policy run when the last co-owner lets go
 */
export function makeShared<T>(
	value: T,
	deleter?: Deleter<NoInfer<T>>
): NonNullShared<T> {
	return NonNull.of(Shared.of(value, deleter));
}

/**
 * Constructs a class instance from constructor arguments under an exclusive
 * owner.
 *
 * @example
 * ```typescript
 * class Point {
 *   constructor(public x: number, public y: number) {}
 * }
 *
 * const point = makeUniqueFrom(Point, 10, 20);
 * point.deref().x; // 10
 * ```
 */
export function makeUniqueFrom<A extends unknown[], I>(
	ctor: new (...args: A) => I,
	...args: A
): NonNullUnique<I> {
	return makeUnique(new ctor(...args));
}

/**
 * Constructs a class instance from constructor arguments under a shared
 * owner.
 */
export function makeSharedFrom<A extends unknown[], I>(
	ctor: new (...args: A) => I,
	...args: A
): NonNullShared<I> {
	return makeShared(new ctor(...args));
}
