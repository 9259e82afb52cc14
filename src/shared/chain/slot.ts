import { InvalidTargetError } from '@/common/types/errors'
import { None, Option, Some } from '@/common/types/option'

export type ErrorClass<T extends Error> = abstract new (...args: never) => T

export type ErrorGuard<T> = (value: unknown) => value is T

/**
 * Output slot for type extraction.
 * `accepts` plays the role of the slot's declared type: a layer is written
 * into the slot when it passes the guard.
 */
export class TargetSlot<T> {
  private current: Option<T> = None()

  constructor(
    readonly accepts: ErrorGuard<T>,
    readonly description: string
  ) {}

  set(value: T): void {
    this.current = Some(value)
  }

  get value(): Option<T> {
    return this.current
  }
}

const isErrorClass = (type: unknown): boolean =>
  type === Error ||
  (typeof type === 'function' && Reflect.get(type, 'prototype') instanceof Error)

/**
 * Slot for a concrete error class. Anything `instanceof type` is accepted,
 * subclasses included.
 */
export const slotOf = <T extends Error>(type: ErrorClass<T>): TargetSlot<T> => {
  if (!isErrorClass(type)) {
    throw new InvalidTargetError('target type must be an interface or extend Error')
  }
  return new TargetSlot((value: unknown): value is T => value instanceof type, type.name)
}

/**
 * Slot for an interface: any layer the guard accepts, whatever its class.
 */
export const slotWhere = <T>(guard: ErrorGuard<T>, description = guard.name || 'interface'): TargetSlot<T> =>
  new TargetSlot(guard, description)

export function assertTargetSlot(slot: unknown): asserts slot is TargetSlot<unknown> {
  if (slot === null || slot === undefined) {
    throw new InvalidTargetError('target cannot be nil')
  }
  if (!(slot instanceof TargetSlot)) {
    throw new InvalidTargetError('target must be a settable slot')
  }
}
