/**
 * The document cannot be rendered as configured: no usable font family, or
 * margins that leave no content area. Raised before any page is produced.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The element tree cannot be laid out: a table row with the wrong number of
 * cells, an invalid weight vector, or a word wider than its line.
 */
export class LayoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LayoutError';
  }
}

/** Raised by a RenderBackend while drawing or serializing pages. */
export class RenderBackendError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RenderBackendError';
  }
}
