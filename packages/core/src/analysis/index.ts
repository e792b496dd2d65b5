/**
 * Structural analysis: state properties, size metrics and emptiness.
 * @packageDocumentation
 */

export { isDead, isSync, deadStates, syncStates, incomingArrowCount, outgoingArrowCount } from './states'
export { size, nodesAndEdges, nodesAndEdgesExcludingTrapStates, cyclomaticComplexity } from './metrics'
export { isEmpty, findWitness } from './emptiness'
