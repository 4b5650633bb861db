import { assume } from './contract.js';
import {
	ConsumedWrapperError,
	NullAddressError,
	NullHandleError,
} from './errors.js';
import { compareAddresses, type Ordering } from './identity.js';
import {
	type CopyableHandle,
	type DeleterAccess,
	type HandleView,
	Owner,
	OwnerKey,
	type OwnerOrdered,
	Pointer,
	type UseCounted,
} from './pointer.js';
import type { Ref } from './ref.js';
import type { Shared } from './shared.js';
import { ExtractKey, type Extractable, type Swappable } from './types.js';
import type { Unique } from './unique.js';

/**
 * Anything with an address: a handle of any kind or a `NonNull` wrapper.
 */
export interface AddressSource {
	get(): Ref<unknown> | null;
}

/**
 * Anything with an owner identity: a `Shared`, a `Weak`, or a wrapper over a
 * shared handle.
 */
export type OwnerSource = OwnerOrdered | { underlying(): OwnerOrdered };

/**
 * A handle that is never null.
 *
 * `NonNull` wraps a handle of any kind (a raw `Ref`, an exclusive `Unique`, a
 * reference-counted `Shared`) and guarantees that it points somewhere for as
 * long as the wrapper is alive. Ownership semantics are those of the wrapped
 * kind, and so is the set of available operations:
 *
 * | Operation                     | `Ref` | `Unique` | `Shared` |
 * |-------------------------------|:-----:|:--------:|:--------:|
 * | `clone`, `assign`             |   ✓   |          |    ✓     |
 * | `move`, `moveAssign`          |   ✓   |          |    ✓     |
 * | `getDeleter`                  |       |    ✓     |          |
 * | `useCount`                    |       |          |    ✓     |
 * | `ownerBefore/Equal/Hash`      |       |          |    ✓     |
 *
 * Operations missing for a kind are rejected by the compiler. An exclusive
 * owner is transferred with `NonNull.of(take(wrapper))` instead of `move()`,
 * so the consumed source is always visible at the call site.
 *
 * Preconditions (a non-null handle, a wrapper that was not consumed) are
 * contracts: see `configureContracts()`.
 *
 * @template T - The type of the pointed-to value
 * @template K - The wrapped handle kind
 *
 * @example
 * ```typescript
 * const config = NonNull.of(ref({ retries: 3 }));
 * config.deref().retries; // 3
 *
 * const owner = makeUnique(new Connection(), (c) => c.close());
 * const moved = NonNull.of(take(owner));
 * moved.destroy(); // closes the connection
 * ```
 */
export class NonNull<T, K extends Pointer<T> = Ref<T>>
	implements Extractable<K>, Swappable<NonNull<T, K>>
{
	private inner: K | undefined;

	private constructor(inner: K) {
		this.inner = inner;
	}

	/**
	 * Wraps a handle that must not be null.
	 *
	 * @throws {NullHandleError} If the handle is null and contracts are enforced
	 */
	static of<T, K extends Pointer<T>>(handle: K & Pointer<T>): NonNull<T, K> {
		assume(
			!Pointer.isNull(handle),
			() => new NullHandleError(Pointer.kind(handle))
		);
		return new NonNull<T, K>(handle);
	}

	/**
	 * Wraps a handle that may be null.
	 *
	 * @returns The wrapper, or `undefined` if the handle is null
	 *
	 * @example
	 * ```typescript
	 * const session = NonNull.tryOf(sessions.get(id) ?? null);
	 * if (session === undefined) {
	 *   return notFound();
	 * }
	 * ```
	 */
	static tryOf<T, K extends Pointer<T>>(
		handle: (K & Pointer<T>) | null | undefined
	): NonNull<T, K> | undefined {
		if (handle === null || handle === undefined || handle.get() === null) {
			return undefined;
		}
		return new NonNull<T, K>(handle);
	}

	/**
	 * Creates a wrapper from a compatible one, copying its handle.
	 *
	 * A wrapper over a more derived pointee converts to one over its base.
	 * Only copyable kinds convert; a raw reference is aliased and a shared
	 * handle gains a co-owner.
	 *
	 * @example
	 * ```typescript
	 * const admin: NonNullShared<Admin> = makeShared(new Admin());
	 * const user: NonNullShared<User> = NonNull.from(admin);
	 * ```
	 */
	static from<T, K extends Pointer<T> & CopyableHandle<K>>(
		other: NonNull<T, K>
	): NonNull<T, K> {
		return new NonNull<T, K>(other.live('from').copy());
	}

	/**
	 * Three-way comparison of two addresses, usable as a sort comparator.
	 */
	static compare(a: AddressSource, b: AddressSource): Ordering {
		return compareAddresses(a.get(), b.get());
	}

	/**
	 * Returns the address the handle points to.
	 */
	get(): Ref<T> {
		const address = this.live('get').get();
		assume(
			address !== null,
			() => new NullAddressError(Pointer.kind(this.inner))
		);
		return address;
	}

	/**
	 * Returns the pointed-to value.
	 */
	deref(): T {
		return this.get().current;
	}

	/**
	 * Returns a borrowed view of the wrapped handle, still owned by this
	 * wrapper. Use `take()` to move the handle out.
	 */
	underlying(): HandleView<K> {
		return this.live('underlying');
	}

	/**
	 * Always `false`.
	 */
	isNull(): false {
		return false;
	}

	/**
	 * Exchanges the handles of two wrappers.
	 */
	swap(other: NonNull<T, K>): void {
		const mine = this.live('swap');
		const theirs = other.live('swap');
		this.inner = theirs;
		other.inner = mine;
	}

	/**
	 * Creates a second wrapper over a copy of the handle.
	 */
	clone(this: NonNull<T, K & CopyableHandle<K>>): NonNull<T, K> {
		return new NonNull<T, K>(this.live('clone').copy());
	}

	/**
	 * Replaces the handle with a copy of another wrapper's handle, releasing
	 * the previous one.
	 */
	assign(
		this: NonNull<T, K & CopyableHandle<K>>,
		other: NonNull<T, K & CopyableHandle<K>>
	): void {
		const next = other.live('assign').copy();
		const self: NonNull<T, K> = this;
		self.replace(next);
	}

	/**
	 * Transfers the handle into a new wrapper without copying it and
	 * consumes this one.
	 */
	move(this: NonNull<T, K & CopyableHandle<K>>): NonNull<T, K> {
		const self: NonNull<T, K> = this;
		return new NonNull<T, K>(self.consume('move'));
	}

	/**
	 * Takes over another wrapper's handle without copying it, releasing the
	 * previous one and consuming `other`.
	 */
	moveAssign(
		this: NonNull<T, K & CopyableHandle<K>>,
		other: NonNull<T, K & CopyableHandle<K>>
	): void {
		if (other === this) {
			return;
		}
		const source: NonNull<T, K> = other;
		const self: NonNull<T, K> = this;
		self.replace(source.consume('moveAssign'));
	}

	/**
	 * Returns the destruction policy of an exclusive owner.
	 */
	getDeleter<D>(this: NonNull<T, K & DeleterAccess<D>>): D {
		return this.live('getDeleter').getDeleter();
	}

	/**
	 * Returns the number of co-owners of a shared handle.
	 */
	useCount(this: NonNull<T, K & UseCounted>): number {
		return this.live('useCount').useCount();
	}

	/**
	 * Owner-based strict ordering of shared handles.
	 */
	ownerBefore(this: NonNull<T, K & OwnerOrdered>, other: OwnerSource): boolean {
		return Owner.before(this.live('ownerBefore'), ownerOf(other));
	}

	/**
	 * Whether two shared handles share ownership of one allocation.
	 */
	ownerEqual(this: NonNull<T, K & OwnerOrdered>, other: OwnerSource): boolean {
		return Owner.equal(this.live('ownerEqual'), ownerOf(other));
	}

	/**
	 * Hash of the owning allocation, consistent with `ownerEqual()`.
	 */
	ownerHash(this: NonNull<T, K & OwnerOrdered>): number {
		return Owner.hash(this.live('ownerHash'));
	}

	/**
	 * Address equality with another wrapper or handle. A wrapper never equals
	 * null.
	 */
	equals(other: null | undefined): false;
	equals(other: AddressSource): boolean;
	equals(other: AddressSource | null | undefined): boolean;
	equals(other: AddressSource | null | undefined): boolean {
		if (other === null || other === undefined) {
			return false;
		}
		return this.get() === other.get();
	}

	notEquals(other: null | undefined): true;
	notEquals(other: AddressSource): boolean;
	notEquals(other: AddressSource | null | undefined): boolean;
	notEquals(other: AddressSource | null | undefined): boolean {
		return !this.equals(other);
	}

	/**
	 * Three-way address comparison. Every wrapper orders after null.
	 */
	compare(other: null | undefined): 1;
	compare(other: AddressSource): Ordering;
	compare(other: AddressSource | null | undefined): Ordering;
	compare(other: AddressSource | null | undefined): Ordering {
		if (other === null || other === undefined) {
			return 1;
		}
		return compareAddresses(this.get(), other.get());
	}

	/**
	 * Releases the handle as its kind prescribes and consumes the wrapper:
	 * nothing for a `Ref`, the deleter for a `Unique`, one co-owner less for a
	 * `Shared`.
	 */
	destroy(): void {
		this.consume('destroy').reset();
	}

	[ExtractKey](): K {
		return this.consume('take');
	}

	private live(operation: string): K {
		const inner = this.inner;
		assume(
			inner !== undefined,
			() => new ConsumedWrapperError('NonNull', operation)
		);
		return inner;
	}

	private consume(operation: string): K {
		const inner = this.live(operation);
		this.inner = undefined;
		return inner;
	}

	/**
	 * Assigning into a consumed wrapper brings it back to life.
	 */
	private replace(next: K): void {
		const previous = this.inner;
		this.inner = next;
		previous?.reset();
	}
}

function ownerOf(source: OwnerSource): OwnerOrdered {
	return OwnerKey in source ? source : source.underlying();
}

/**
 * A non-null raw reference.
 */
export type NonNullRef<T> = NonNull<T, Ref<T>>;

/**
 * A non-null exclusive owner.
 */
export type NonNullUnique<T> = NonNull<T, Unique<T>>;

/**
 * A non-null shared owner.
 */
export type NonNullShared<T> = NonNull<T, Shared<T>>;
