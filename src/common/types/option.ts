// -------- TYPES --------

export type Option<T> = Some<T> | None<T>

export interface Some<T> {
  readonly _tag: 'Some'
  readonly value: T
}

export interface None<T> {
  readonly _tag: 'None'
}

// -------- CONSTRUCTORS --------

export const Some = <T>(value: T): Option<T> => ({ _tag: 'Some', value })

export const None = <T>(): Option<T> => ({ _tag: 'None' })

// -------- GUARDS --------

export const isSome = <T>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some'

export const isNone = <T>(option: Option<T>): option is None<T> =>
  option._tag === 'None'

// -------- CORE OPERATIONS --------

/**
 * Get the value if Some, otherwise return a default.
 */
export const getOrElse = <T>(defaultValue: T) => (option: Option<T>): T =>
  isSome(option) ? option.value : defaultValue

/**
 * Convert Option to undefined, for handing a slot's content back to callers
 * that branch on presence.
 */
export const toUndefined = <T>(option: Option<T>): T | undefined =>
  isSome(option) ? option.value : undefined
