export {
  parseSymbol, parseTape, parseBehavior, parseState, parseProgram, machineFromPatterns,
} from './parser';
export {
  formatSymbol, formatTape, formatBehavior, formatState, formatProgram,
  formatProgramSource, formatProgramInline,
} from './serializer';
export { parseProgramSource } from './source';
export type { ProgramSourceResult } from './source';
