/**
 * Capability instances and ordered-set helpers.
 * @packageDocumentation
 */

export { naturalOrder, fromCompare, lexicographicOrder, primitiveOrder, type Primitive } from './order'
export { sortUnique, uniqueBy, includesBy, differenceBy, intersectBy, sameSequence } from './ordered-set'
