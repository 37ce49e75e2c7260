/** Freezes `value` and every object reachable from it. */
export function deepFreeze<T>(value: T): T {
  const stack: unknown[] = [value]

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (typeof node !== "object" || node === null || Object.isFrozen(node)) continue

    Object.freeze(node)
    for (const child of Object.values(node)) stack.push(child)
  }

  return value
}
