import {
	ContractViolationError,
	InvalidContractModeError,
} from './errors.js';

/**
 * How preconditions are handled.
 *
 * - `enforce` checks every precondition and hands a breach to the violation
 *   handler. This is the debug-build behavior and the default.
 * - `assume` skips the checks: the invariant is taken for granted and a breach
 *   is undefined behavior (usually a `TypeError` further down the line). This
 *   is the release-build behavior.
 */
export type ContractMode = 'enforce' | 'assume';

/**
 * Receives every contract violation while checks are enforced.
 * It must not return normally: throw, or terminate the process.
 */
export type ViolationHandler = (violation: ContractViolationError) => never;

export interface ContractSettings {
	readonly mode: ContractMode;
	readonly onViolation: ViolationHandler;
}

/**
 * Environment variable that overrides the default contract mode.
 *
 * It is read on first use of the contract settings, not at import. An
 * unknown value is reported then as an `InvalidContractModeError`.
 */
export const ContractModeEnv = 'STRICT_HANDLES_CONTRACTS';

const throwViolation: ViolationHandler = (violation) => {
	throw violation;
};

function isContractMode(value: unknown): value is ContractMode {
	return value === 'enforce' || value === 'assume';
}

function modeFromEnvironment(env: NodeJS.ProcessEnv): ContractMode {
	const configured = env[ContractModeEnv];
	if (configured !== undefined && configured !== '') {
		if (!isContractMode(configured)) {
			throw new InvalidContractModeError(configured, ContractModeEnv);
		}
		return configured;
	}
	return env.NODE_ENV === 'production' ? 'assume' : 'enforce';
}

function defaultSettings(): ContractSettings {
	return {
		mode: modeFromEnvironment(process.env),
		onViolation: throwViolation,
	};
}

let settings: ContractSettings | undefined;

function activeSettings(): ContractSettings {
	settings ??= defaultSettings();
	return settings;
}

/**
 * Changes how contract violations are detected and reported.
 *
 * Settings are process-wide. Options that are left out keep their current
 * value.
 *
 * @throws {InvalidContractModeError} If `mode` is not a known contract mode
 *
 * @example Abort instead of throwing
 * ```typescript
 * configureContracts({
 *   onViolation: (violation) => {
 *     console.error(violation.dumps());
 *     process.abort();
 *   },
 * });
 * ```
 */
export function configureContracts(options: Partial<ContractSettings>): void {
	if (options.mode !== undefined && !isContractMode(options.mode)) {
		throw new InvalidContractModeError(options.mode, 'configureContracts()');
	}
	settings = {
		mode: options.mode ?? activeSettings().mode,
		onViolation: options.onViolation ?? activeSettings().onViolation,
	};
}

/**
 * Returns the active contract settings.
 */
export function contractSettings(): ContractSettings {
	return activeSettings();
}

/**
 * Restores the settings derived from the environment. The environment is
 * read again on next use.
 */
export function resetContracts(): void {
	settings = undefined;
}

/**
 * Asserts a precondition and lets the compiler assume it from here on.
 *
 * Under `enforce` a false condition reports the violation built by
 * `violation`; the factory is only called on failure. Under `assume` nothing
 * is checked, so the narrowing is a promise made by the caller.
 */
export function assume(
	condition: unknown,
	violation: () => ContractViolationError
): asserts condition {
	const { mode, onViolation } = activeSettings();
	if (mode === 'assume') {
		return;
	}
	if (!condition) {
		onViolation(violation());
	}
}
