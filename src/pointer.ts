import { addressOf } from './identity.js';
import type { Ref } from './ref.js';

/**
 * Base contract every handle kind implements.
 *
 * A handle is null when it is `null` or `undefined`, or when `get()` returns
 * `null` (an empty owning handle).
 *
 * @template T - The type of the value the handle points to
 */
export interface Pointer<T> {
	/**
	 * Returns the address the handle points to, without affecting ownership.
	 */
	get(): Ref<T> | null;

	/**
	 * Releases whatever the handle owns and leaves it empty.
	 */
	reset(): void;
}

/**
 * Extracts the pointee type of a handle kind.
 *
 * @example
 * ```typescript
 * type A = PointeeOf<Unique<string>>; // string
 * type B = PointeeOf<Ref<{ id: number }>>; // { id: number }
 * ```
 */
export type PointeeOf<K> = K extends Pointer<infer T> ? T : never;

/**
 * Borrowed view of a handle held by a wrapper.
 *
 * The operations that would empty the handle are left out, so the view
 * cannot break the wrapper's non-null guarantee.
 */
export type HandleView<K> = Omit<K, 'reset' | 'release' | 'swap'>;

/**
 * Capability of kinds whose handles can be duplicated without leaving the
 * source empty: raw references alias, shared handles add a co-owner.
 */
export interface CopyableHandle<K> {
	copy(): K;
}

/**
 * Capability of kinds with a pluggable destruction policy.
 */
export interface DeleterAccess<D> {
	getDeleter(): D;
}

/**
 * Capability of kinds that count their co-owners.
 */
export interface UseCounted {
	useCount(): number;
}

/**
 * Key under which owner-identified handles expose their owner.
 * @internal
 */
export const OwnerKey: unique symbol = Symbol.for('strict-handles/Owner');

/**
 * Capability of kinds that identify the allocation owning their value, as
 * opposed to the address they point to.
 *
 * The owner is `null` for an empty handle.
 */
export interface OwnerOrdered {
	readonly [OwnerKey]: object | null;
}

/**
 * Owner-based comparisons shared by every owner-identified handle.
 *
 * Two handles compare owner-equal when they share ownership of the same
 * allocation, whatever they point to; an empty handle orders before any
 * non-empty one.
 */
export const Owner = {
	before: (a: OwnerOrdered, b: OwnerOrdered): boolean =>
		addressOf(a[OwnerKey]) < addressOf(b[OwnerKey]),

	equal: (a: OwnerOrdered, b: OwnerOrdered): boolean =>
		a[OwnerKey] === b[OwnerKey],

	hash: (a: OwnerOrdered): number => addressOf(a[OwnerKey]),
};

/**
 * Utility object for inspecting handles of any kind.
 */
export const Pointer = {
	/**
	 * Returns the address of a handle, or `null` for a null handle.
	 */
	address: <T>(handle: Pointer<T> | null | undefined): Ref<T> | null =>
		handle === null || handle === undefined ? null : handle.get(),

	/**
	 * Whether a handle is null: the `null` or `undefined` literal, or an
	 * owning handle that owns nothing.
	 */
	isNull: (handle: Pointer<unknown> | null | undefined): boolean =>
		Pointer.address(handle) === null,

	/**
	 * Name of a handle's kind, used in error messages.
	 */
	kind: (handle: Pointer<unknown> | null | undefined): string => {
		if (handle === null) return 'null';
		if (handle === undefined) return 'undefined';
		return handle.constructor.name || 'handle';
	},
};
