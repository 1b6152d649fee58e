// =============================================================================
// ID Generator Interface
// =============================================================================

/**
 * Options for ID generation.
 */
export type IdGeneratorOptions = {
  /**
   * Optional prefix to prepend to the generated ID, separated by a dash.
   */
  readonly prefix?: string;
};

/**
 * Generates identifiers for sessions and connections.
 */
export interface IdGenerator {
  generate(options?: IdGeneratorOptions): string;
}
