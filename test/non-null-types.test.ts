import { makeShared, makeUnique } from '@/factories.js';
import {
	NonNull,
	type NonNullRef,
	type NonNullShared,
	type NonNullUnique,
} from '@/non-null.js';
import type { HandleView, PointeeOf } from '@/pointer.js';
import { ref, type Ref } from '@/ref.js';
import { Shared, Weak } from '@/shared.js';
import { take } from '@/take.js';
import { Unique, type Deleter } from '@/unique.js';
import { describe, expectTypeOf, it, vi } from 'vitest';

describe('NonNull type inference', () => {
	describe('construction', () => {
		it('should infer the pointee and the kind from the handle', () => {
			const raw = NonNull.of(ref(42));
			const unique = NonNull.of(Unique.of('value'));
			const shared = NonNull.of(Shared.of({ id: 1 }));

			expectTypeOf(raw).toEqualTypeOf<NonNullRef<number>>();
			expectTypeOf(unique).toEqualTypeOf<NonNullUnique<string>>();
			expectTypeOf(shared).toEqualTypeOf<NonNullShared<{ id: number }>>();
		});

		it('should default to a raw reference', () => {
			expectTypeOf<NonNull<number>>().toEqualTypeOf<
				NonNull<number, Ref<number>>
			>();
		});

		it('should reject null handles statically', () => {
			const build = () => {
				// @ts-expect-error - null is not a handle
				NonNull.of(null);
				// @ts-expect-error - undefined is not a handle
				NonNull.of(undefined);
			};

			expectTypeOf(build).toBeFunction();
		});

		it('should infer the pointee from the value, not the deleter', () => {
			const shared = makeShared('old', vi.fn());
			const unique = Unique.of('a', vi.fn());
			const owner = makeUnique(1, (value) => void value);

			expectTypeOf(shared).toEqualTypeOf<NonNullShared<string>>();
			expectTypeOf(unique).toEqualTypeOf<Unique<string>>();
			expectTypeOf(owner).toEqualTypeOf<NonNullUnique<number>>();
		});

		it('should make tryOf() possibly undefined', () => {
			const maybe = NonNull.tryOf(Unique.of(1));

			expectTypeOf(maybe).toEqualTypeOf<NonNullUnique<number> | undefined>();
		});

		it('should type the value and the address', () => {
			const wrapper = makeUnique({ retries: 3 });

			expectTypeOf(wrapper.deref()).toEqualTypeOf<{ retries: number }>();
			expectTypeOf(wrapper.get()).toEqualTypeOf<Ref<{ retries: number }>>();
			expectTypeOf(wrapper.underlying()).toEqualTypeOf<
				HandleView<Unique<{ retries: number }>>
			>();
			expectTypeOf(take(wrapper)).toEqualTypeOf<Unique<{ retries: number }>>();
		});
	});

	describe('ownership-dependent operations', () => {
		it('should not let the borrowed handle be emptied', () => {
			const misuse = (
				unique: NonNullUnique<number>,
				shared: NonNullShared<number>
			) => {
				// @ts-expect-error - the view cannot release ownership
				unique.underlying().release();
				// @ts-expect-error - the view cannot reset the handle
				unique.underlying().reset();
				// @ts-expect-error - the view cannot reset the handle
				shared.underlying().reset();
				// @ts-expect-error - the view cannot swap the handle out
				shared.underlying().swap(Shared.empty());
			};

			expectTypeOf(misuse).toBeFunction();
		});

		it('should keep the read-only operations of the borrowed handle', () => {
			const unique = makeUnique('file');
			const shared = makeShared(1);

			expectTypeOf(unique.underlying().get()).toEqualTypeOf<
				Ref<string> | null
			>();
			expectTypeOf(shared.underlying().copy()).toEqualTypeOf<Shared<number>>();
			expectTypeOf(shared.underlying().useCount()).toEqualTypeOf<number>();
		});

		it('should allow copy and move of shared handles', () => {
			const shared = makeShared(1);

			expectTypeOf(shared.clone()).toEqualTypeOf<NonNullShared<number>>();
			expectTypeOf(shared.move()).toEqualTypeOf<NonNullShared<number>>();
		});

		it('should allow copy and move of raw references', () => {
			const raw = NonNull.of(ref('value'));

			expectTypeOf(raw.clone()).toEqualTypeOf<NonNullRef<string>>();
			expectTypeOf(raw.move()).toEqualTypeOf<NonNullRef<string>>();
		});

		it('should reject copy and move of exclusive owners', () => {
			const misuse = (a: NonNullUnique<number>, b: NonNullUnique<number>) => {
				// @ts-expect-error - an exclusive owner cannot be copied
				a.clone();
				// @ts-expect-error - an exclusive owner cannot be copied
				a.assign(b);
				// @ts-expect-error - moving would leave the source null
				a.move();
				// @ts-expect-error - moving would leave the source null
				a.moveAssign(b);
				// @ts-expect-error - an exclusive owner cannot be copied
				NonNull.from(a);
			};

			expectTypeOf(misuse).toBeFunction();
		});

		it('should expose the deleter of exclusive owners only', () => {
			const unique = makeUnique('file');

			expectTypeOf(unique.getDeleter()).toEqualTypeOf<Deleter<string>>();

			const misuse = (
				shared: NonNullShared<string>,
				raw: NonNullRef<string>
			) => {
				// @ts-expect-error - shared handles have no deleter access
				shared.getDeleter();
				// @ts-expect-error - raw references have no deleter
				raw.getDeleter();
			};

			expectTypeOf(misuse).toBeFunction();
		});

		it('should expose counts and owner ordering of shared handles only', () => {
			const shared = makeShared('value');

			const observer = shared.underlying().weak();

			expectTypeOf(observer).toEqualTypeOf<Weak<string>>();
			expectTypeOf(shared.useCount()).toEqualTypeOf<number>();
			expectTypeOf(shared.ownerBefore(observer)).toEqualTypeOf<boolean>();
			expectTypeOf(shared.ownerHash()).toEqualTypeOf<number>();

			const misuse = (
				unique: NonNullUnique<string>,
				raw: NonNullRef<string>
			) => {
				// @ts-expect-error - exclusive owners are not counted
				unique.useCount();
				// @ts-expect-error - raw references have no owner
				raw.ownerEqual(shared);
				// @ts-expect-error - raw references have no owner
				raw.ownerHash();
			};

			expectTypeOf(misuse).toBeFunction();
		});
	});

	describe('conversion', () => {
		it('should convert to a wrapper over a base pointee', () => {
			type User = { name: string };
			type Admin = User & { level: number };
			const admin: NonNullShared<Admin> = makeShared({
				name: 'root',
				level: 9,
			});

			const user: NonNullShared<User> = NonNull.from(admin);

			expectTypeOf(user.deref()).toEqualTypeOf<User>();
		});

		it('should not mix handle kinds', () => {
			const misuse = (shared: NonNullShared<number>) => {
				// @ts-expect-error - a shared handle is not a raw reference
				const raw: NonNullRef<number> = shared;
				return raw;
			};

			expectTypeOf(misuse).toBeFunction();
		});
	});

	describe('comparison', () => {
		it('should give constant results against null', () => {
			const wrapper = NonNull.of(ref(0));

			expectTypeOf(wrapper.equals(null)).toEqualTypeOf<false>();
			expectTypeOf(wrapper.notEquals(undefined)).toEqualTypeOf<true>();
			expectTypeOf(wrapper.compare(null)).toEqualTypeOf<1>();
			expectTypeOf(wrapper.isNull()).toEqualTypeOf<false>();
		});

		it('should give general results against handles', () => {
			const wrapper = NonNull.of(ref(0));

			expectTypeOf(wrapper.equals(ref(1))).toEqualTypeOf<boolean>();
			expectTypeOf(wrapper.compare(wrapper)).toEqualTypeOf<-1 | 0 | 1>();
		});
	});

	describe('PointeeOf', () => {
		it('should extract the pointee of every kind', () => {
			expectTypeOf<PointeeOf<Ref<number>>>().toEqualTypeOf<number>();
			expectTypeOf<PointeeOf<Unique<string>>>().toEqualTypeOf<string>();
			expectTypeOf<PointeeOf<Shared<boolean>>>().toEqualTypeOf<boolean>();
		});
	});
});
