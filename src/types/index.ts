/**
 * Shared type definitions for go-annotate
 */

// Re-export error types
export {
    AnnotationException,
    isAnnotationError,
    createProteinNotFoundError,
    createTermNotFoundError,
    createResolutionError,
    createObsoleteTermError,
    createWrongAspectError,
    createInvalidTermIdError,
    createInvalidRuleError,
    createInvalidInputError,
    createSourceUnavailableError,
    serializeAnnotationError,
} from './errors.js';

export type {
    AnnotationErrorCode,
    AnnotationError,
} from './errors.js';

// Re-export term types
export {
    isTermId,
    serializeTerm,
    deserializeTerm,
} from './term.js';

export type {
    TermId,
    Term,
    ExplicitTerm,
    ProteinAnnotationSet,
    SerializedTerm,
} from './term.js';

// Re-export rule types
export type {
    ClassificationRule,
    RuleSet,
    RuleDefinition,
    RuleIssueKind,
    RuleIssue,
    RuleOverlap,
} from './rules.js';

// Re-export source interface
export type { AnnotationSource } from './source.js';

// Re-export response types
export type {
    AnnotationRow,
    ClassificationRow,
    OutputMode,
    ProteinOutcome,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    Logger,
    ResolveOptions,
    OutputOptions,
    BatchOptions,
    ServiceOptions,
} from './options.js';
