import type { TermId } from './term.js';

/**
 * A category predicate: a protein matches when it carries every
 * required term and none of the forbidden ones.
 */
export interface ClassificationRule {
    readonly label: string;
    readonly required: ReadonlySet<TermId>;
    readonly forbidden: ReadonlySet<TermId>;
}

/** Rules in evaluation order. Order is significant and never re-sorted. */
export type RuleSet = readonly ClassificationRule[];

/** Rule as written in a JSON rule file */
export interface RuleDefinition {
    label: string;
    required?: TermId[];
    forbidden?: TermId[];
}

export type RuleIssueKind = 'dead_rule' | 'duplicate_label';

/**
 * Problem found in a rule set. Reported, never thrown by classification.
 */
export interface RuleIssue {
    kind: RuleIssueKind;
    index: number;
    label: string;
    message: string;
    terms?: TermId[];
}

/**
 * Two rules whose covered terms intersect: a protein annotated with any of
 * `terms` matches both, so first-match-wins decides between them.
 */
export interface RuleOverlap {
    first: string;
    second: string;
    terms: TermId[];
}
