import * as R from 'ramda'
import type { IdentityMatcher, TypeExtractor, Unwrapper } from '@/common/types/capabilities'
import { hasAs, hasIs } from '@/common/types/capabilities'
import * as chain from '@/shared/chain'
import { assertTargetSlot, TargetSlot } from '@/shared/chain/slot'

/**
 * `front` stacked over `back`.
 *
 * Walking the chain visits front and everything it wraps, then back and
 * everything it wraps. `is` and `as` only ever look at `front`; the generic
 * walks in `@/shared/chain` reach the rest through `unwrap`, so a front that
 * already matches through its own capability is not visited twice.
 *
 * `cause` exposes the same next layer as `unwrap`, so walkers that only
 * follow `cause` see the whole chain too.
 *
 * Build these with `combine`, which handles the nil cases. Instances of
 * CompositeError itself are frozen; subclasses are left extensible so their
 * own fields can be defined.
 */
export class CompositeError extends Error implements Unwrapper, IdentityMatcher, TypeExtractor {
  readonly front: Error
  readonly back: Error

  constructor(front: Error, back: Error) {
    super(`${front.message}: ${back.message}`)
    this.name = 'CompositeError'
    this.front = front
    this.back = back
    if (new.target === CompositeError) Object.freeze(this)
  }

  get cause(): Error {
    return this.unwrap()
  }

  is(target: Error): boolean {
    if (R.isNil(target)) return false

    const { front } = this
    if (front === target) return true
    return hasIs(front) && front.is(target)
  }

  as<T>(slot: TargetSlot<T>): boolean {
    assertTargetSlot(slot)

    const { front } = this
    if (slot.accepts(front)) {
      slot.set(front)
      return true
    }
    return hasAs(front) && front.as(slot)
  }

  // Peels front one layer at a time, keeping back in reserve until front runs out.
  unwrap(): Error {
    const next = chain.unwrap(this.front)
    return next === undefined ? this.back : new CompositeError(next, this.back)
  }
}

/**
 * Stacks `front` over `back`. When either is nil the other comes back as is,
 * and two nils give undefined.
 */
export const combine = (
  back: Error | null | undefined,
  front: Error | null | undefined
): Error | undefined => {
  if (R.isNil(front)) return R.isNil(back) ? undefined : back
  if (R.isNil(back)) return front
  return new CompositeError(front, back)
}
