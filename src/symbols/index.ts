export { SymbolTable, spanToRange, type SymbolInfo } from './symbol-table.js';
export { collectLeadingComment } from './documentation.js';
