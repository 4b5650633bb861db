export type ErrorDump = {
	name: string;
	message: string;
	stack?: string;
	detail: Record<string, unknown>;
};

/**
 * Base error class for all library errors.
 *
 * @example Catching library errors
 * ```typescript
 * try {
 *   NonNull.of(handle);
 * } catch (error) {
 *   if (error instanceof NonNullError) {
 *     console.error(error.dumps());
 *   }
 * }
 * ```
 */
export class NonNullError extends Error {
	readonly detail: Record<string, unknown>;

	constructor(message: string, detail: Record<string, unknown> = {}) {
		super(message);
		this.name = this.constructor.name;
		this.detail = detail;
	}

	dump(): ErrorDump {
		return {
			name: this.name,
			message: this.message,
			stack: this.stack,
			detail: this.detail,
		};
	}

	dumps(): string {
		return JSON.stringify(this.dump());
	}
}

/**
 * Names of the contracts a wrapper can breach.
 */
export type ContractName = 'non-null' | 'non-empty' | 'live';

/**
 * Base class for every invariant breach.
 *
 * A contract violation is a programming error, not a recoverable condition.
 * With contract checks enabled it is handed to the configured violation
 * handler, which throws it by default. With checks disabled it is never
 * created and the behavior of the offending call is undefined.
 */
export class ContractViolationError extends NonNullError {
	constructor(
		readonly contract: ContractName,
		message: string,
		detail: Record<string, unknown> = {}
	) {
		super(message, { contract, ...detail });
	}
}

/**
 * Raised when a wrapper is constructed over a null handle.
 *
 * Covers the `null` and `undefined` literals as well as an owning handle
 * whose address is `null` (an empty or released `Unique`, a reset `Shared`).
 * Use `NonNull.tryOf()` to turn a possibly-null handle into a wrapper or
 * `undefined` without breaching this contract.
 */
export class NullHandleError extends ContractViolationError {
	/**
	 * @internal
	 * @param kind - Name of the handle kind that was null
	 */
	constructor(kind: string) {
		super('non-null', `Cannot wrap a null handle (${kind})`, { kind });
	}
}

/**
 * Raised when a live wrapper finds its handle null on access.
 *
 * This only happens when the wrapper was built while contracts were assumed,
 * or when the handle was emptied behind the wrapper's back.
 */
export class NullAddressError extends ContractViolationError {
	/**
	 * @internal
	 * @param kind - Name of the handle kind that was null
	 */
	constructor(kind: string) {
		super('non-null', `NonNull holds a null handle (${kind})`, { kind });
	}
}

/**
 * Raised when a callable wrapper is constructed from something that is not
 * a function.
 */
export class EmptyCallableError extends ContractViolationError {
	/**
	 * @internal
	 * @param received - `typeof` of the rejected value
	 */
	constructor(received: string) {
		super('non-empty', `Cannot wrap an empty callable (got ${received})`, {
			received,
		});
	}
}

/**
 * Raised when a wrapper is used after it has been consumed.
 *
 * `take()`, `destroy()` and a move out of a wrapper leave it dead. Any later
 * access to the dead wrapper is reported with the operation that was
 * attempted.
 *
 * @example
 * ```typescript
 * const owner = makeUnique(42);
 * const handle = take(owner);
 * owner.deref(); // ConsumedWrapperError: Cannot deref() a consumed NonNull
 * ```
 */
export class ConsumedWrapperError extends ContractViolationError {
	/**
	 * @internal
	 * @param wrapper - Class name of the consumed wrapper
	 * @param operation - The operation attempted on it
	 */
	constructor(wrapper: string, operation: string) {
		super('live', `Cannot ${operation}() a consumed ${wrapper}`, {
			wrapper,
			operation,
		});
	}
}

/**
 * Error thrown when a contract mode is configured with an unknown value,
 * either through `configureContracts()` or the `STRICT_HANDLES_CONTRACTS`
 * environment variable.
 */
export class InvalidContractModeError extends NonNullError {
	/**
	 * @internal
	 * @param value - The rejected value
	 * @param source - Where the value came from
	 */
	constructor(value: unknown, source: string) {
		super(
			`Invalid contract mode ${JSON.stringify(value)} from ${source}; expected "enforce" or "assume"`,
			{ value, source }
		);
	}
}
