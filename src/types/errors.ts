/**
 * Structured Error System for go-annotate
 *
 * Provides machine-readable errors with codes, context, and suggestions.
 */

/**
 * Error codes for annotation and classification
 */
export type AnnotationErrorCode =
  | 'NOT_FOUND'             // Protein or term unknown to the annotation source
  | 'RESOLUTION_ERROR'      // Term referenced in a closure is not resolvable
  | 'OBSOLETE_TERM'         // Term has been retired from the ontology
  | 'WRONG_ASPECT'          // Term is not a molecular function
  | 'INVALID_TERM_ID'       // Malformed GO identifier
  | 'INVALID_RULE'          // Rule definition rejected by the schema
  | 'INVALID_INPUT'         // Bad caller input (empty accession, missing column)
  | 'SOURCE_UNAVAILABLE';   // Annotation service unreachable or failing

/**
 * Structured error with code, message and suggestions
 */
export interface AnnotationError {
  code: AnnotationErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The protein or term being processed
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping AnnotationError for throw/catch patterns
 */
export class AnnotationException extends Error {
  public readonly error: AnnotationError;

  constructor(error: AnnotationError) {
    super(error.message);
    this.name = 'AnnotationException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnnotationException);
    }
  }

  get code(): AnnotationErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): AnnotationError {
    return this.error;
  }
}

/**
 * Narrow an unknown thrown value to an AnnotationException with the given code(s)
 */
export function isAnnotationError(
  e: unknown,
  ...codes: AnnotationErrorCode[]
): e is AnnotationException {
  if (!(e instanceof AnnotationException)) return false;
  return codes.length === 0 || codes.includes(e.code);
}

/**
 * Create a not-found error for a protein accession
 */
export function createProteinNotFoundError(proteinId: string, status?: number): AnnotationException {
  return new AnnotationException({
    code: 'NOT_FOUND',
    message: `Protein '${proteinId}' is unknown to the annotation source`,
    suggestion: 'Check that the value is a current UniProt accession',
    context: proteinId,
    details: status !== undefined ? { proteinId, status } : { proteinId },
  });
}

/**
 * Create a not-found error for a GO term
 */
export function createTermNotFoundError(termId: string): AnnotationException {
  return new AnnotationException({
    code: 'NOT_FOUND',
    message: `GO term '${termId}' is unknown to the annotation source`,
    context: termId,
    details: { termId },
  });
}

/**
 * Create a resolution error for a term missing from the hierarchy
 */
export function createResolutionError(
  termId: string,
  proteinId?: string,
  reason?: string
): AnnotationException {
  const where = proteinId ? ` while resolving '${proteinId}'` : '';
  return new AnnotationException({
    code: 'RESOLUTION_ERROR',
    message: `Cannot resolve GO term '${termId}'${where}${reason ? `: ${reason}` : ''}`,
    suggestion: 'Load the term hierarchy before computing closures',
    context: proteinId ?? termId,
    details: proteinId ? { termId, proteinId } : { termId },
  });
}

/**
 * Create an obsolete term error
 */
export function createObsoleteTermError(termId: string): AnnotationException {
  return new AnnotationException({
    code: 'OBSOLETE_TERM',
    message: `GO term '${termId}' is obsolete`,
    suggestion: 'Replace the term with its current successor',
    context: termId,
    details: { termId },
  });
}

/**
 * Create an error for a term outside the molecular-function aspect
 */
export function createWrongAspectError(termId: string, aspect: string): AnnotationException {
  return new AnnotationException({
    code: 'WRONG_ASPECT',
    message: `GO term '${termId}' is a ${aspect} term, not a molecular function`,
    context: termId,
    details: { termId, aspect },
  });
}

/**
 * Create an invalid term identifier error
 */
export function createInvalidTermIdError(value: string): AnnotationException {
  return new AnnotationException({
    code: 'INVALID_TERM_ID',
    message: `'${value}' is not a GO identifier`,
    suggestion: 'GO identifiers look like GO:0016301',
    context: value,
  });
}

/**
 * Create an invalid rule error
 */
export function createInvalidRuleError(
  message: string,
  details?: Record<string, unknown>
): AnnotationException {
  return new AnnotationException({
    code: 'INVALID_RULE',
    message: `Invalid rule definition: ${message}`,
    suggestion: 'Rules are objects of the form { "label": ..., "required": [...], "forbidden": [...] }',
    details,
  });
}

/**
 * Create an invalid input error
 */
export function createInvalidInputError(
  message: string,
  details?: Record<string, unknown>
): AnnotationException {
  return new AnnotationException({
    code: 'INVALID_INPUT',
    message,
    details,
  });
}

/**
 * Create a source unavailable error
 */
export function createSourceUnavailableError(
  url: string,
  reason: string,
  status?: number
): AnnotationException {
  return new AnnotationException({
    code: 'SOURCE_UNAVAILABLE',
    message: `Annotation source request failed (${reason})`,
    suggestion: 'Check network access or set QUICKGO_BASE_URL',
    context: url,
    details: status !== undefined ? { url, status } : { url },
  });
}

/**
 * Serialize an AnnotationError for JSON output
 */
export function serializeAnnotationError(error: AnnotationError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
