/**
 * Plain-data export of automata.
 * @packageDocumentation
 */

export { exportDfa, exportTable } from './export'
