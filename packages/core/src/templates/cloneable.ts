/**
 * A value that can produce an independent deep copy of itself.
 *
 * Implementations must clone every owned mutable reference (nested entities,
 * arrays, records) rather than share it with the copy.
 */
export interface Cloneable<T> {
  clone(): T;
}
