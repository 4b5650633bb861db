import { assume } from './contract.js';
import { ConsumedWrapperError } from './errors.js';
import { assumeCallable, type Callable } from './function.js';
import { ExtractKey, type Extractable, type Swappable } from './types.js';

/**
 * A callable that is never empty and is never duplicated.
 *
 * Meant for functions that own something only one caller may hold, such as
 * a closure over an exclusively-owned handle. There is no `clone()`,
 * `assign()`, `move()` or `moveAssign()`: the function changes hands only
 * through `take()`, which consumes the wrapper.
 *
 * @template A - The parameter types
 * @template R - The result type
 *
 * @example
 * ```typescript
 * const connection = makeUnique(openConnection(), (c) => c.close());
 * const query = new NonNullMoveOnlyFunction((sql: string) =>
 *   connection.deref().query(sql)
 * );
 *
 * const handedOver = new NonNullMoveOnlyFunction(take(query));
 * ```
 */
export class NonNullMoveOnlyFunction<A extends unknown[], R>
	implements
		Extractable<Callable<A, R>>,
		Swappable<NonNullMoveOnlyFunction<A, R>>
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
	static of<A extends unknown[], R>(
		fn: Callable<A, R>
	): NonNullMoveOnlyFunction<A, R> {
		return new NonNullMoveOnlyFunction(fn);
	}

	invoke(...args: A): R {
		return this.live('invoke')(...args);
	}

	/**
	 * Returns the wrapped function, still owned by this wrapper.
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

	swap(other: NonNullMoveOnlyFunction<A, R>): void {
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
			() => new ConsumedWrapperError('NonNullMoveOnlyFunction', operation)
		);
		return fn;
	}
}
