import type { TargetSlot } from '@/shared/chain/slot'

// Optional capabilities an error may expose to the chain algorithms.
// They are discovered structurally; no base class is involved.

/** Produces the next error in the chain, or nothing when the chain ends here. */
export interface Unwrapper {
  unwrap(): Error | null | undefined
}

/** Reports whether this value represents `target`. */
export interface IdentityMatcher {
  is(target: Error): boolean
}

/** Writes this value, or one it knows about, into `slot` when the slot accepts it. */
export interface TypeExtractor {
  as<T>(slot: TargetSlot<T>): boolean
}

// -------- GUARDS --------

const hasMethod = <K extends string>(
  value: unknown,
  key: K
): value is Record<K, (...args: never) => unknown> =>
  typeof value === 'object' &&
  value !== null &&
  key in value &&
  typeof Reflect.get(value, key) === 'function'

export const hasUnwrap = (value: unknown): value is Unwrapper =>
  hasMethod(value, 'unwrap')

export const hasIs = (value: unknown): value is IdentityMatcher =>
  hasMethod(value, 'is')

export const hasAs = (value: unknown): value is TypeExtractor =>
  hasMethod(value, 'as')
