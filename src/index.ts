// Handle wrapper
export { NonNull } from './non-null.js';
export type {
	AddressSource,
	NonNullRef,
	NonNullShared,
	NonNullUnique,
	OwnerSource,
} from './non-null.js';

// Factories
export {
	makeShared,
	makeSharedFrom,
	makeUnique,
	makeUniqueFrom,
} from './factories.js';

// Handle kinds
export { Pointer, Owner, OwnerKey } from './pointer.js';
export type {
	CopyableHandle,
	DeleterAccess,
	HandleView,
	OwnerOrdered,
	PointeeOf,
	UseCounted,
} from './pointer.js';
export { Ref, ref } from './ref.js';
export { Shared, Weak } from './shared.js';
export { Unique, defaultDelete } from './unique.js';
export type { Deleter } from './unique.js';

// Callable wrappers
export { NonNullFunction } from './function.js';
export type {
	Callable,
	FunctionType,
	NonNullFunctionOf,
	ResultType,
} from './function.js';
export { NonNullMoveOnlyFunction } from './move-only-function.js';

// Extraction
export { swap, take } from './take.js';
export type { Extractable, Swappable } from './types.js';

// Contracts
export {
	ContractModeEnv,
	assume,
	configureContracts,
	contractSettings,
	resetContracts,
} from './contract.js';
export type {
	ContractMode,
	ContractSettings,
	ViolationHandler,
} from './contract.js';

// Errors
export {
	ConsumedWrapperError,
	ContractViolationError,
	EmptyCallableError,
	InvalidContractModeError,
	NonNullError,
	NullAddressError,
	NullHandleError,
} from './errors.js';
export type { ContractName, ErrorDump } from './errors.js';

// Identity
export { addressOf, compareAddresses } from './identity.js';
export type { Ordering } from './identity.js';
