/**
 * State Atom
 *
 * A mutable cell with change listeners. Pools keep their queue counters in
 * one, and the explorer keeps its application state in another; in both
 * cases a single owner writes and anyone may read or listen.
 */

export type AtomListener<T> = (state: T) => void

export type Atom<T> = {
  get: () => T
  update: (updater: (state: T) => T) => void
  /** @returns unsubscribe */
  subscribe: (listener: AtomListener<T>) => () => void
}

export function createAtom<T>(initialState: T): Atom<T> {
  let state = initialState
  const listeners = new Set<AtomListener<T>>()

  return {
    get: () => state,
    update: (updater) => {
      state = updater(state)
      listeners.forEach((listener) => listener(state))
    },
    subscribe: (listener) => {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
