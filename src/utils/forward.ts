/**
 * Return the tokens of `args` that may be passed on to an operation which
 * does not accept the flags named in `exclude`.
 *
 * A value token is kept only when it follows a kept flag. Values with no
 * preceding flag, or following an excluded one, are dropped.
 */
export function filterForwards(args: readonly string[], exclude: ReadonlySet<string>): string[] {
  const result: string[] = []
  // A leading bare value would only confuse pip
  let admitted = false

  for (const arg of args) {
    if (!arg.startsWith('-')) {
      if (admitted) {
        result.push(arg)
      }
    } else if (exclude.has(arg.replace(/^-+/, ''))) {
      admitted = false
    } else {
      result.push(arg)
      admitted = true
    }
  }

  return result
}
