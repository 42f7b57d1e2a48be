/**
 * Row types produced by the annotation service
 */

import type { AnnotationErrorCode } from './errors.js';
import type { TermId } from './term.js';

/** One implied function of one protein (full-annotation mode) */
export interface AnnotationRow {
    uniprotId: string;
    goId?: TermId;
    proteinFunction: string;
    error?: AnnotationErrorCode;
}

/** Category assigned to one protein (category mode) */
export interface ClassificationRow {
    uniprotId: string;
    proteinFunction: string;
    error?: AnnotationErrorCode;
}

export type OutputMode = 'full' | 'category';

/**
 * Per-protein outcome of a batch, in input order
 */
export type ProteinOutcome<T> =
    | { proteinId: string; ok: true; value: T }
    | { proteinId: string; ok: false; error: AnnotationErrorCode; message: string };
