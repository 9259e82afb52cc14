export { CompositeError, combine } from '@/stack/composite'
export { wrapf } from '@/stack/wrap'
export { unwrap, layers, is, as, extract, messages, formatChain } from '@/shared/chain'
export { TargetSlot, slotOf, slotWhere, assertTargetSlot } from '@/shared/chain/slot'
export type { ErrorClass, ErrorGuard } from '@/shared/chain/slot'
export { hasUnwrap, hasIs, hasAs } from '@/common/types/capabilities'
export type { Unwrapper, IdentityMatcher, TypeExtractor } from '@/common/types/capabilities'
export { InvalidTargetError } from '@/common/types/errors'
export type { Option, Some, None } from '@/common/types/option'
export { isSome, isNone, getOrElse, toUndefined } from '@/common/types/option'
