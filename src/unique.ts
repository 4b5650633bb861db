import type { DeleterAccess, Pointer } from './pointer.js';
import { Ref } from './ref.js';

/**
 * Destruction policy of an owning handle, called with the owned value when
 * ownership ends.
 */
export type Deleter<T> = (value: T) => void;

/**
 * The default destruction policy.
 *
 * Memory is reclaimed by the garbage collector once the value is unreachable,
 * so there is nothing to do. Pass a custom deleter to close files, sockets or
 * other resources the value holds.
 */
export function defaultDelete(value: unknown): void {
	void value;
}

/**
 * Exclusive owner of a single allocation.
 *
 * At most one `Unique` owns a given `Ref`. Ownership leaves it in two ways:
 * `reset()` ends it and runs the deleter, `release()` hands the `Ref` back
 * without running it. A `Unique` cannot be copied.
 *
 * @template T - The type of the owned value
 *
 * @example
 * ```typescript
 * const file = new Unique(ref(openFile('a.txt')), (f) => f.close());
 *
 * file.get()?.current.write('hello');
 * file.reset(); // closes the file
 * ```
 */
export class Unique<T> implements Pointer<T>, DeleterAccess<Deleter<T>> {
	private owned: Ref<T> | null;
	private deleter: Deleter<T>;

	constructor(
		owned: Ref<T> | null = null,
		deleter: Deleter<NoInfer<T>> = defaultDelete
	) {
		this.owned = owned;
		this.deleter = deleter;
	}

	/**
	 * Allocates `value` and takes ownership of it.
	 */
	static of<T>(value: T, deleter?: Deleter<NoInfer<T>>): Unique<T> {
		return new Unique(new Ref(value), deleter);
	}

	get(): Ref<T> | null {
		return this.owned;
	}

	getDeleter(): Deleter<T> {
		return this.deleter;
	}

	/**
	 * Gives up ownership without running the deleter.
	 *
	 * @returns The previously owned `Ref`, or `null` if the handle was empty
	 */
	release(): Ref<T> | null {
		const owned = this.owned;
		this.owned = null;
		return owned;
	}

	/**
	 * Replaces the owned allocation, running the deleter on the previous one.
	 *
	 * Resetting to the allocation already owned is a no-op.
	 */
	reset(next: Ref<T> | null = null): void {
		const previous = this.owned;
		if (previous === next) {
			return;
		}
		this.owned = next;
		if (previous !== null) {
			this.deleter(previous.current);
		}
	}

	/**
	 * Exchanges the owned allocations and deleters of two handles.
	 */
	swap(other: Unique<T>): void {
		const owned = this.owned;
		this.owned = other.owned;
		other.owned = owned;

		// The deleter travels with its allocation
		const deleter = this.deleter;
		this.deleter = other.deleter;
		other.deleter = deleter;
	}
}
