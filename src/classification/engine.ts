import type { TermId } from '../types/term.js';
import type { ClassificationRule, RuleIssue, RuleOverlap, RuleSet } from '../types/rules.js';
import { TermGraph } from '../ontology/termGraph.js';

/**
 * True when the protein carries every required term and no forbidden one.
 */
export function matchesRule(terms: ReadonlySet<TermId>, rule: ClassificationRule): boolean {
    for (const id of rule.required) {
        if (!terms.has(id)) return false;
    }
    for (const id of rule.forbidden) {
        if (terms.has(id)) return false;
    }
    return true;
}

/**
 * Label of the first matching rule, or undefined when no rule matches.
 *
 * Rules are evaluated strictly in the given order. A rule with an empty
 * required set matches everything its forbidden set allows, so placing it
 * before more specific rules shadows them; the order is the caller's.
 */
export function classify(terms: ReadonlySet<TermId>, rules: RuleSet): string | undefined {
    for (const rule of rules) {
        if (matchesRule(terms, rule)) {
            return rule.label;
        }
    }
    return undefined;
}

/**
 * Labels of every matching rule, in rule order.
 */
export function classifyAll(terms: ReadonlySet<TermId>, rules: RuleSet): string[] {
    return rules.filter((rule) => matchesRule(terms, rule)).map((rule) => rule.label);
}

/**
 * The rule set with outdated term identifiers replaced by the ones the
 * graph knows them as. Labels and order are unchanged.
 */
export function canonicalRules(rules: RuleSet, graph: TermGraph): RuleSet {
    const current = (ids: ReadonlySet<TermId>) => new Set([...ids].map((id) => graph.canonicalId(id)));
    return Object.freeze(rules.map((rule) => Object.freeze({
        label: rule.label,
        required: current(rule.required),
        forbidden: current(rule.forbidden),
    })));
}

/**
 * Static checks on a rule set: rules that can never match, and labels
 * used more than once.
 */
export function validateRules(rules: RuleSet): RuleIssue[] {
    const issues: RuleIssue[] = [];
    const seen = new Map<string, number>();

    rules.forEach((rule, index) => {
        const clash = [...rule.required].filter((id) => rule.forbidden.has(id)).sort();
        if (clash.length > 0) {
            issues.push({
                kind: 'dead_rule',
                index,
                label: rule.label,
                message: `'${rule.label}' requires and forbids ${clash.join(', ')} and can never match`,
                terms: clash,
            });
        }

        const first = seen.get(rule.label);
        if (first !== undefined) {
            issues.push({
                kind: 'duplicate_label',
                index,
                label: rule.label,
                message: `'${rule.label}' is already defined by rule ${first}`,
            });
        } else {
            seen.set(rule.label, index);
        }
    });

    return issues;
}

/**
 * Pairs of rules that claim the same terms.
 *
 * A rule covers every descendant of its required terms, minus the
 * forbidden terms and everything below them. Catch-all rules (empty
 * required set) are left out. The graph must already hold the subtrees of
 * interest; only loaded terms are considered.
 */
export function findCoverageOverlaps(rules: RuleSet, graph: TermGraph): RuleOverlap[] {
    const covered = rules.map((rule) => coverage(rule, graph));
    const overlaps: RuleOverlap[] = [];

    for (let i = 0; i < rules.length; i++) {
        for (let j = i + 1; j < rules.length; j++) {
            const shared = [...covered[i]].filter((id) => covered[j].has(id)).sort();
            if (shared.length > 0) {
                overlaps.push({ first: rules[i].label, second: rules[j].label, terms: shared });
            }
        }
    }
    return overlaps;
}

function coverage(rule: ClassificationRule, graph: TermGraph): Set<TermId> {
    // A protein annotated with a term must carry all required terms, so
    // only terms below every required term belong to the rule.
    let result: Set<TermId> | undefined;
    for (const id of rule.required) {
        if (!graph.hasTerm(id)) return new Set();
        const below = graph.descendants([id]);
        result = result ? new Set([...result].filter((t) => below.has(t))) : below;
    }
    if (!result) return new Set();

    const excluded = graph.descendants([...rule.forbidden].filter((id) => graph.hasTerm(id)));
    for (const id of excluded) {
        result.delete(id);
    }
    return result;
}
