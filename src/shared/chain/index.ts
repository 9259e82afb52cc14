import * as R from 'ramda'
import { hasAs, hasIs, hasUnwrap } from '@/common/types/capabilities'
import { None, Option } from '@/common/types/option'
import { assertTargetSlot, ErrorClass, slotOf, TargetSlot } from '@/shared/chain/slot'

// Generic walks over an error chain. Each one reads a layer, consults the
// layer's own capability if it has one, then steps with `unwrap`.

/**
 * Single step down the chain: the layer's own `unwrap()` when it has one,
 * otherwise its ES2022 `cause` when that is an Error.
 */
export const unwrap = (err: Error | null | undefined): Error | undefined => {
  if (R.isNil(err)) return undefined
  if (hasUnwrap(err)) return err.unwrap() ?? undefined
  return err.cause instanceof Error ? err.cause : undefined
}

/**
 * Every layer of the chain, outermost first. Lazy; ends when `unwrap`
 * yields nothing.
 */
export function* layers(err: Error | null | undefined): Generator<Error, void, undefined> {
  for (let layer = err ?? undefined; layer !== undefined; layer = unwrap(layer)) {
    yield layer
  }
}

/**
 * Reports whether any layer of `err` is, or says it represents, `target`.
 * Two nils match each other and nothing else.
 */
export const is = (err: Error | null | undefined, target: Error | null | undefined): boolean => {
  if (R.isNil(err) || R.isNil(target)) return R.isNil(err) && R.isNil(target)

  for (const layer of layers(err)) {
    if (layer === target) return true
    if (hasIs(layer) && layer.is(target)) return true
  }
  return false
}

/**
 * Writes the first layer `slot` accepts into it and returns true.
 * A malformed slot throws InvalidTargetError even when `err` is nil.
 */
export const as = <T>(err: Error | null | undefined, slot: TargetSlot<T>): boolean => {
  assertTargetSlot(slot)

  for (const layer of layers(err)) {
    if (slot.accepts(layer)) {
      slot.set(layer)
      return true
    }
    if (hasAs(layer) && layer.as(slot)) return true
  }
  return false
}

/**
 * First layer that is an instance of `type`.
 */
export const extract = <T extends Error>(err: Error | null | undefined, type: ErrorClass<T>): Option<T> => {
  const slot = slotOf(type)
  return as(err, slot) ? slot.value : None()
}

export const messages = (err: Error | null | undefined): string[] =>
  R.map((layer: Error) => layer.message, Array.from(layers(err)))

/**
 * One line per layer, indented by depth. Meant for handing to a logger.
 */
export const formatChain = (err: Error | null | undefined): string =>
  Array.from(layers(err))
    .map((layer, depth) => `${'  '.repeat(depth)}${layer.name}: ${layer.message}`)
    .join('\n')
