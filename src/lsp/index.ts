export * from './types.js';
export {
  analyzeDocument,
  errorCodeFromMessage,
  estimateErrorWidth,
} from './diagnostics.js';
export {
  builtinCompletion,
  builtinMarkdown,
  getCompletions,
  keywordCompletion,
  symbolCompletion,
} from './completion.js';
export { extractWordAtPosition, getHover } from './hover.js';
export {
  DocumentStore,
  type DocumentCloseEvent,
  type DocumentDiagnosticsEvent,
  type DocumentParseEvent,
  type DocumentStoreCallbacks,
  type DocumentStoreOptions,
} from './document-store.js';
