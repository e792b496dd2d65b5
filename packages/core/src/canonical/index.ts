/**
 * Canonical renaming and structural equivalence.
 * @packageDocumentation
 */

export { rename, beautify } from './rename'
export { beautifyWithSentinel, sentinelOrder, DEAD_SENTINEL } from './sentinel'
export { structurallyEqual, areIsomorphic } from './equivalence'
