import {
	type CopyableHandle,
	Owner,
	OwnerKey,
	type OwnerOrdered,
	type Pointer,
	type UseCounted,
} from './pointer.js';
import { Ref } from './ref.js';
import { type Deleter, defaultDelete } from './unique.js';

/**
 * Bookkeeping shared by every co-owner and observer of one allocation.
 *
 * The block is the allocation's owner identity. Its disposer is type-erased
 * at construction, so handles of different pointee types can share one block.
 * @internal
 */
export class ControlBlock<T> {
	uses = 1;

	constructor(
		public ref: Ref<T> | null,
		private readonly dispose: () => void
	) {}

	/**
	 * Drops one owner; the last one disposes of the value.
	 */
	releaseUse(): void {
		this.uses -= 1;
		if (this.uses === 0 && this.ref !== null) {
			this.ref = null;
			this.dispose();
		}
	}
}

/**
 * Reference-counted owner of a single allocation.
 *
 * Every `copy()` adds a co-owner and every `reset()` drops one. When the last
 * owner lets go, the deleter runs on the value and weak observers expire.
 *
 * @template T - The type of the owned value
 *
 * @example
 * ```typescript
 * const first = Shared.of({ connections: 0 });
 * const second = first.copy();
 *
 * first.useCount(); // 2
 * second.reset();
 * first.useCount(); // 1
 * ```
 */
export class Shared<T>
	implements Pointer<T>, CopyableHandle<Shared<T>>, UseCounted, OwnerOrdered
{
	private block: ControlBlock<T> | null;

	private constructor(block: ControlBlock<T> | null) {
		this.block = block;
	}

	/**
	 * Allocates `value` and becomes its first owner.
	 */
	static of<T>(value: T, deleter?: Deleter<NoInfer<T>>): Shared<T> {
		return Shared.adopt(new Ref(value), deleter);
	}

	/**
	 * Takes ownership of an existing allocation. Adopting `null` gives an
	 * empty handle.
	 */
	static adopt<T>(
		owned: Ref<T> | null,
		deleter: Deleter<NoInfer<T>> = defaultDelete
	): Shared<T> {
		if (owned === null) {
			return Shared.empty();
		}
		const allocation = owned;
		return new Shared(
			new ControlBlock(allocation, () => deleter(allocation.current))
		);
	}

	/**
	 * Creates a handle that owns nothing.
	 */
	static empty<T>(): Shared<T> {
		return new Shared<T>(null);
	}

	/**
	 * @internal - Used by Weak.lock()
	 */
	static _fromBlock<T>(block: ControlBlock<T>): Shared<T> {
		block.uses += 1;
		return new Shared(block);
	}

	/**
	 * @internal - Used by Weak
	 */
	_controlBlock(): ControlBlock<T> | null {
		return this.block;
	}

	get [OwnerKey](): object | null {
		return this.block;
	}

	get(): Ref<T> | null {
		return this.block?.ref ?? null;
	}

	copy(): Shared<T> {
		if (this.block === null) {
			return Shared.empty();
		}
		return Shared._fromBlock(this.block);
	}

	useCount(): number {
		return this.block?.uses ?? 0;
	}

	reset(): void {
		const block = this.block;
		this.block = null;
		block?.releaseUse();
	}

	swap(other: Shared<T>): void {
		const block = this.block;
		this.block = other.block;
		other.block = block;
	}

	/**
	 * Creates a weak observer of this handle's allocation.
	 */
	weak(): Weak<T> {
		return new Weak(this);
	}

	ownerBefore(other: OwnerOrdered): boolean {
		return Owner.before(this, other);
	}

	ownerEqual(other: OwnerOrdered): boolean {
		return Owner.equal(this, other);
	}

	ownerHash(): number {
		return Owner.hash(this);
	}
}

/**
 * Non-owning observer of a shared allocation.
 *
 * A weak handle never keeps the value alive. It can be upgraded with
 * `lock()` while at least one owner remains, and it keeps the owner identity
 * of the allocation after expiring.
 *
 * @template T - The type of the observed value
 */
export class Weak<T> implements UseCounted, OwnerOrdered {
	private block: ControlBlock<T> | null;

	constructor(source?: Shared<T> | Weak<T>) {
		this.block = source?._controlBlock() ?? null;
	}

	/**
	 * @internal - Used when copying observers
	 */
	_controlBlock(): ControlBlock<T> | null {
		return this.block;
	}

	get [OwnerKey](): object | null {
		return this.block;
	}

	useCount(): number {
		return this.block?.uses ?? 0;
	}

	/**
	 * Whether every owner has let go of the allocation.
	 */
	expired(): boolean {
		return this.useCount() === 0;
	}

	/**
	 * Upgrades to an owning handle, or an empty one once expired.
	 */
	lock(): Shared<T> {
		if (this.block === null || this.block.uses === 0) {
			return Shared.empty();
		}
		return Shared._fromBlock(this.block);
	}

	/**
	 * Stops observing the allocation.
	 */
	reset(): void {
		this.block = null;
	}

	ownerBefore(other: OwnerOrdered): boolean {
		return Owner.before(this, other);
	}

	ownerEqual(other: OwnerOrdered): boolean {
		return Owner.equal(this, other);
	}

	ownerHash(): number {
		return Owner.hash(this);
	}
}
