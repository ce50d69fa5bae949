export { ProgramIndex, packageOf, type ImportAlias, type ProgramIndexOptions } from './program-index.js';
export { ResolutionTable, type Resolution } from './resolution-table.js';
export { SymbolResolver, type ResolutionScope, type ResolveOutcome } from './symbol-resolver.js';
