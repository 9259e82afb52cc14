// Faults raised for caller misuse. Ordinary "not found" outcomes are never thrown.

/**
 * Thrown when type extraction is handed a target it cannot write into:
 * a nil target, something other than a TargetSlot, or a slot whose type
 * is neither an interface guard nor an Error class.
 */
export class InvalidTargetError extends Error {
  constructor(message: string) {
    super(`errstack: ${message}`)
    this.name = 'InvalidTargetError'
  }
}
