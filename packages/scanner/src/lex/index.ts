/**
 * Lexical analysis module.
 * Scans source text into a flat array of tokens.
 */

export { type CharClass, classifyChar, isAlpha, isAlphaNumeric, isDigit } from './classify.ts'
export { type ScanResult, scan } from './scanner.ts'
