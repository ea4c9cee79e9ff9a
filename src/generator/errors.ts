export type TScriptGenerationErrorCode =
  | 'EMPTY_MANIFEST'
  | 'MISSING_CALLABLE_NAME'
  | 'INVALID_CALLABLE_NAME'
  | 'INVALID_BINDING_NAME'
  | 'DUPLICATE_NODE_ID'
  | 'UNDEFINED_CALLABLE'
  | 'DUPLICATE_DEFINITION';

/**
 * Raised before any script text is produced when the manifest cannot be
 * turned into a well-formed program.
 */
export class ScriptGenerationError extends Error {
  constructor(
    public readonly code: TScriptGenerationErrorCode,
    message: string,
    public readonly nodeId?: string
  ) {
    super(message);
    this.name = 'ScriptGenerationError';
  }

  static isScriptGenerationError(error: unknown): error is ScriptGenerationError {
    return (
      error instanceof ScriptGenerationError ||
      (error instanceof Error && error.name === 'ScriptGenerationError')
    );
  }
}
