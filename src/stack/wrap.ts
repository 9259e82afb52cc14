import * as R from 'ramda'

const directive = /%%|%[swv]/g

/**
 * Adds context to `cause`: the first `%s`, `%w` or `%v` in `format` becomes
 * the cause's message, `%%` becomes `%`, and the cause stays reachable as
 * `cause`. Verbs after the first are left as written.
 */
export const wrapf = (format: string, cause: Error | null | undefined): Error | undefined => {
  if (R.isNil(cause)) return undefined

  const { message } = cause
  let substituted = false
  const rendered = format.replace(directive, (match) => {
    if (match === '%%') return '%'
    if (substituted) return match
    substituted = true
    return message
  })
  return new Error(rendered, { cause })
}
