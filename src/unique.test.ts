import { describe, expect, it, vi } from 'vitest';
import { ref } from './ref.js';
import { Unique, defaultDelete } from './unique.js';

describe('Unique', () => {
	it('should own a new allocation', () => {
		const unique = Unique.of(42);

		expect(unique.get()?.current).toBe(42);
	});

	it('should be empty by default', () => {
		const unique = new Unique<string>();

		expect(unique.get()).toBeNull();
		expect(unique.getDeleter()).toBe(defaultDelete);
	});

	it('should return the deleter it was given', () => {
		const deleter = vi.fn();
		const unique = Unique.of('file', deleter);

		expect(unique.getDeleter()).toBe(deleter);
	});

	describe('reset()', () => {
		it('should run the deleter on the owned value', () => {
			const deleter = vi.fn();
			const unique = Unique.of('file', deleter);

			unique.reset();

			expect(deleter).toHaveBeenCalledTimes(1);
			expect(deleter).toHaveBeenCalledWith('file');
			expect(unique.get()).toBeNull();
		});

		it('should not run the deleter when empty', () => {
			const deleter = vi.fn();
			const unique = new Unique<string>(null, deleter);

			unique.reset();

			expect(deleter).not.toHaveBeenCalled();
		});

		it('should take ownership of the next allocation', () => {
			const deleter = vi.fn();
			const unique = Unique.of('old', deleter);
			const next = ref('new');

			unique.reset(next);

			expect(unique.get()).toBe(next);
			expect(deleter).toHaveBeenCalledTimes(1);
			expect(deleter).toHaveBeenCalledWith('old');
		});

		it('should ignore a reset to the allocation already owned', () => {
			const deleter = vi.fn();
			const owned = ref('same');
			const unique = new Unique(owned, deleter);

			unique.reset(owned);

			expect(unique.get()).toBe(owned);
			expect(deleter).not.toHaveBeenCalled();
		});
	});

	describe('release()', () => {
		it('should give up ownership without running the deleter', () => {
			const deleter = vi.fn();
			const owned = ref(7);
			const unique = new Unique(owned, deleter);

			const released = unique.release();

			expect(released).toBe(owned);
			expect(unique.get()).toBeNull();
			expect(deleter).not.toHaveBeenCalled();
		});

		it('should return null when empty', () => {
			expect(new Unique<number>().release()).toBeNull();
		});
	});

	describe('swap()', () => {
		it('should exchange allocations together with their deleters', () => {
			const closeA = vi.fn();
			const closeB = vi.fn();
			const a = Unique.of('a', closeA);
			const b = Unique.of('b', closeB);

			a.swap(b);

			expect(a.get()?.current).toBe('b');
			expect(a.getDeleter()).toBe(closeB);
			expect(b.get()?.current).toBe('a');
			expect(b.getDeleter()).toBe(closeA);

			a.reset();

			expect(closeB).toHaveBeenCalledTimes(1);
			expect(closeB).toHaveBeenCalledWith('b');
			expect(closeA).not.toHaveBeenCalled();
		});
	});
});
