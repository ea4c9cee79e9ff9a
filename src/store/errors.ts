export class ComponentValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(issues.join('; '));
    this.name = 'ComponentValidationError';
  }

  static isComponentValidationError(error: unknown): error is ComponentValidationError {
    return (
      error instanceof ComponentValidationError ||
      (error instanceof Error && error.name === 'ComponentValidationError')
    );
  }
}

export class ComponentNotFoundError extends Error {
  constructor(
    public readonly componentId: string,
    /** Position of the workflow item that referenced the component, if any */
    public readonly itemIndex?: number
  ) {
    super(
      itemIndex === undefined
        ? `Component not found: ${componentId}`
        : `Component not found at index ${itemIndex}: ${componentId}`
    );
    this.name = 'ComponentNotFoundError';
  }

  static isComponentNotFoundError(error: unknown): error is ComponentNotFoundError {
    return (
      error instanceof ComponentNotFoundError ||
      (error instanceof Error && error.name === 'ComponentNotFoundError')
    );
  }
}
