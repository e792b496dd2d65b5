/**
 * Automaton validation.
 * @packageDocumentation
 */

export { validateDefinition, validateTableDefinition, validateDfa, isValidDfa } from './validator'
