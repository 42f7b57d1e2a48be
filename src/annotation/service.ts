/**
 * Annotation Service
 *
 * Runs the resolver and the classification engine over a protein list and
 * shapes the results as table rows. One bad accession produces an error
 * row; an unreachable annotation source aborts the run.
 */

import type { Term, TermId } from '../types/term.js';
import type { RuleSet } from '../types/rules.js';
import type { Logger, OutputOptions, ServiceOptions } from '../types/options.js';
import type { AnnotationRow, ClassificationRow, ProteinOutcome } from '../types/responses.js';
import { DEFAULTS } from '../types/options.js';
import { isAnnotationError } from '../types/errors.js';
import { AnnotationResolver, PER_PROTEIN_ERRORS } from './resolver.js';
import { canonicalRules, classify, classifyAll } from '../classification/engine.js';
import { displayName } from '../utils/naming.js';
import { mapInChunks, unique } from '../utils/batch.js';

export interface ClassifyOptions {
    /** Emit every matching label instead of the first one */
    allMatches?: boolean;
}

export class AnnotationService {
    private readonly options: ServiceOptions;
    private readonly logger: Logger;

    constructor(readonly resolver: AnnotationResolver, options: ServiceOptions = {}) {
        this.options = options;
        this.logger = options.logger ?? console;
    }

    /**
     * Every implied function of every protein, one row per term.
     */
    async annotateProteins(proteinIds: readonly string[]): Promise<AnnotationRow[]> {
        const outcomes = await this.resolve(proteinIds);
        return outcomes.flatMap((outcome) => this.annotationRows(outcome));
    }

    /**
     * Like annotateProteins(), keeping only functions from `restriction`.
     */
    async annotateSelected(
        proteinIds: readonly string[],
        restriction: Iterable<TermId>
    ): Promise<AnnotationRow[]> {
        const outcomes = await this.resolve(proteinIds, new Set(restriction));
        return outcomes.flatMap((outcome) => this.annotationRows(outcome));
    }

    /**
     * One category per protein (first matching rule), or every matching
     * category with `allMatches`.
     */
    async classifyProteins(
        proteinIds: readonly string[],
        rules: RuleSet,
        options: ClassifyOptions = {}
    ): Promise<ClassificationRow[]> {
        const current = await this.prepareRules(rules);
        const outcomes = await this.resolve(proteinIds);
        const unmatched = this.options.unmatchedLabel ?? DEFAULTS.unmatchedLabel;

        return outcomes.flatMap((outcome): ClassificationRow[] => {
            if (!outcome.ok) {
                return [{ uniprotId: outcome.proteinId, proteinFunction: DEFAULTS.errorLabel, error: outcome.error }];
            }
            const terms = new Set(outcome.value.keys());
            const labels = options.allMatches
                ? classifyAll(terms, current)
                : [classify(terms, current)].filter((label): label is string => label !== undefined);

            if (labels.length === 0) {
                return [{ uniprotId: outcome.proteinId, proteinFunction: unmatched }];
            }
            return labels.map((label) => ({ uniprotId: outcome.proteinId, proteinFunction: label }));
        });
    }

    /**
     * Loads the terms the rules name so that outdated identifiers map to
     * current ones. A term that cannot be loaded stays as written.
     */
    private async prepareRules(rules: RuleSet): Promise<RuleSet> {
        const ids = unique(rules.flatMap((rule) => [...rule.required, ...rule.forbidden]));
        await mapInChunks(
            ids,
            async (id) => {
                try {
                    await this.resolver.loadTerms([id]);
                } catch (e) {
                    if (!isAnnotationError(e, ...PER_PROTEIN_ERRORS)) throw e;
                    this.logger.warn(`Rule term ${id} is not usable: ${e.message}`);
                }
            },
            { concurrency: this.options.concurrency ?? DEFAULTS.concurrency }
        );
        return canonicalRules(rules, this.resolver.graph);
    }

    private async resolve(
        proteinIds: readonly string[],
        restrictTo?: ReadonlySet<TermId>
    ): Promise<ProteinOutcome<Map<TermId, Term>>[]> {
        const outcomes = await this.resolver.resolveMany(unique(proteinIds.map((id) => id.trim())), {
            restrictTo,
            concurrency: this.options.concurrency ?? DEFAULTS.concurrency,
            onProgress: this.options.onProgress,
        });
        for (const outcome of outcomes) {
            if (!outcome.ok) {
                this.logger.warn(`Skipping ${outcome.proteinId}: ${outcome.message}`);
            }
        }
        return outcomes;
    }

    private annotationRows(outcome: ProteinOutcome<Map<TermId, Term>>): AnnotationRow[] {
        if (!outcome.ok) {
            return [{ uniprotId: outcome.proteinId, proteinFunction: DEFAULTS.errorLabel, error: outcome.error }];
        }
        const rows = formatAnnotation(outcome.proteinId, outcome.value.values(), this.options);
        if (rows.length === 0) {
            return [{
                uniprotId: outcome.proteinId,
                proteinFunction: this.options.unmatchedLabel ?? DEFAULTS.unmatchedLabel,
            }];
        }
        return rows;
    }
}

/**
 * Rows for one protein's terms, sorted by identifier.
 */
export function formatAnnotation(
    proteinId: string,
    terms: Iterable<Term>,
    options: OutputOptions = {}
): AnnotationRow[] {
    return [...terms]
        .filter((term) => options.includeRoot || term.id !== DEFAULTS.rootTermId)
        .sort((a, b) => a.id.localeCompare(b.id))
        .map((term) => ({
            uniprotId: proteinId,
            goId: term.id,
            proteinFunction: displayName(term, options),
        }));
}
