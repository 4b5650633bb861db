import { assume } from './contract.js';
import { ConsumedWrapperError, EmptyCallableError } from './errors.js';
import { ExtractKey, type Extractable, type Swappable } from './types.js';

/**
 * A callable taking `A` and returning `R`.
 */
export type Callable<A extends unknown[], R> = (...args: A) => R;

/**
 * Extracts the callable type held by a callable wrapper.
 */
export type FunctionType<W> = W extends { underlying(): infer F } ? F : never;

/**
 * Extracts the result type of a callable wrapper.
 */
export type ResultType<W> =
	FunctionType<W> extends (...args: never[]) => infer R ? R : never;

/**
 * `NonNullFunction` over the signature of a function type.
 *
 * @example
 * ```typescript
 * type Parser = NonNullFunctionOf<(input: string) => number>;
 * // NonNullFunction<[input: string], number>
 * ```
 */
export type NonNullFunctionOf<F> = F extends (
	...args: infer A extends unknown[]
) => infer R
	? NonNullFunction<A, R>
	: never;

/**
 * Asserts that a value about to be wrapped is a function.
 * @internal
 */
export function assumeCallable(fn: unknown): void {
	assume(typeof fn === 'function', () => new EmptyCallableError(typeof fn));
}

/**
 * A callable that is never empty.
 *
 * The wrapper can be copied freely: copies share the same function. A move
 * out of it is a copy as well, so the source stays usable afterwards.
 *
 * @template A - The parameter types
 * @template R - The result type
 *
 * @example
 * ```typescript
 * const double = NonNullFunction.of((x: number) => x * 2);
 * double.invoke(21); // 42
 *
 * const handlers = [double.clone(), double.move()];
 * double.invoke(1); // still 2
 * ```
 */
export class NonNullFunction<A extends unknown[], R>
	implements Extractable<Callable<A, R>>, Swappable<NonNullFunction<A, R>>
{
	private fn: Callable<A, R> | undefined;

	/**
	 * @throws {EmptyCallableError} If `fn` is not a function and contracts are
	 * enforced
	 */
	constructor(fn: Callable<A, R>) {
		assumeCallable(fn);
		this.fn = fn;
	}

	/**
	 * Wraps a function, inferring the signature from it.
	 */
	static of<A extends unknown[], R>(fn: Callable<A, R>): NonNullFunction<A, R> {
		return new NonNullFunction(fn);
	}

	/**
	 * Calls the function.
	 */
	invoke(...args: A): R {
		return this.live('invoke')(...args);
	}

	/**
	 * Returns the wrapped function itself.
	 */
	underlying(): Callable<A, R> {
		return this.live('underlying');
	}

	/**
	 * Always `false`.
	 */
	isEmpty(): false {
		return false;
	}

	clone(): NonNullFunction<A, R> {
		return new NonNullFunction(this.live('clone'));
	}

	/**
	 * Replaces the function with the one held by `other`. Assigning into a
	 * consumed wrapper brings it back to life.
	 */
	assign(other: NonNullFunction<A, R>): void {
		this.fn = other.live('assign');
	}

	/**
	 * A copy: the source stays valid and non-empty.
	 */
	move(): NonNullFunction<A, R> {
		return new NonNullFunction(this.live('move'));
	}

	/**
	 * A copy assignment: `other` stays valid and non-empty.
	 */
	moveAssign(other: NonNullFunction<A, R>): void {
		this.fn = other.live('moveAssign');
	}

	swap(other: NonNullFunction<A, R>): void {
		const mine = this.live('swap');
		this.fn = other.live('swap');
		other.fn = mine;
	}

	[ExtractKey](): Callable<A, R> {
		const fn = this.live('take');
		this.fn = undefined;
		return fn;
	}

	private live(operation: string): Callable<A, R> {
		const fn = this.fn;
		assume(
			fn !== undefined,
			() => new ConsumedWrapperError('NonNullFunction', operation)
		);
		return fn;
	}
}
