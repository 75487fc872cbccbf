export {
  BUILTINS,
  BUILTIN_CATEGORIES,
  KEYWORD_DOCS,
  builtinsInCategory,
  findBuiltin,
  parseBuiltinEntries,
  parseKeywordEntries,
  type BuiltinFunction,
  type KeywordDoc,
} from './catalog.js';
