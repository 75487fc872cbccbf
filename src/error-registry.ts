/**
 * Error Registry
 * Central error definition registry keyed by error id.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'check';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: AETHER-{category letter}{3-digit} (e.g., AETHER-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description */
  readonly description: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Parse errors
  {
    errorId: 'AETHER-P001',
    category: 'parse',
    description: 'Unexpected token',
  },
  {
    errorId: 'AETHER-P002',
    category: 'parse',
    description: 'Unexpected end of input',
  },
  {
    errorId: 'AETHER-P003',
    category: 'parse',
    description: 'Invalid numeric literal',
  },
  {
    errorId: 'AETHER-P004',
    category: 'parse',
    description: 'Invalid expression',
  },
  {
    errorId: 'AETHER-P005',
    category: 'parse',
    description: 'Invalid statement',
  },
  {
    errorId: 'AETHER-P006',
    category: 'parse',
    description: 'Invalid identifier',
  },

  // Check errors
  {
    errorId: 'AETHER-C001',
    category: 'check',
    description: 'Invalid check configuration',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);
