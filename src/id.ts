/** Source of numeric ids for stores that cannot rely on the database. */
export type IdGenerator = () => number;

/** Monotonic counter; ids are never reused, even after deletes. */
export function createSequence(start = 1): IdGenerator {
  let next = start;
  return () => next++;
}
