export type Less<T> = (a: T, b: T) => boolean

export const ascending = <T extends number | string>(a: T, b: T): boolean =>
  a < b
export const descending = <T extends number | string>(a: T, b: T): boolean =>
  b < a

/**
 * Order records by a projected key, e.g. `by(user => user.id)`.
 */
export const by =
  <T, K extends number | string>(
    key: (x: T) => K,
    less: Less<K> = ascending
  ): Less<T> =>
  (a, b) =>
    less(key(a), key(b))
