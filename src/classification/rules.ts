import { z } from 'zod';
import type { ClassificationRule, RuleDefinition, RuleSet } from '../types/rules.js';
import type { TermId } from '../types/term.js';
import { isTermId } from '../types/term.js';
import { createInvalidRuleError } from '../types/errors.js';
import defaultRuleFile from '../resources/default-rules.json';

/**
 * Build an immutable rule.
 *
 * A term both required and forbidden makes the rule unmatchable; that is
 * accepted here and reported by validateRules().
 */
export function defineRule(
    label: string,
    required: Iterable<TermId> = [],
    forbidden: Iterable<TermId> = []
): ClassificationRule {
    if (!label.trim()) {
        throw createInvalidRuleError('label must not be empty');
    }
    const check = (id: TermId) => {
        if (!isTermId(id)) {
            throw createInvalidRuleError(`'${id}' in '${label}' is not a GO identifier`, { label, term: id });
        }
        return id;
    };
    return Object.freeze({
        label,
        required: new Set([...required].map(check)),
        forbidden: new Set([...forbidden].map(check)),
    });
}

const termIdSchema = z.string().regex(/^GO:\d{7}$/, 'expected a GO identifier like GO:0016301');

const ruleDefinitionSchema = z.object({
    label: z.string().min(1),
    required: z.array(termIdSchema).default([]),
    forbidden: z.array(termIdSchema).default([]),
});

/** Either a bare array of rules or `{ "rules": [...] }` */
const ruleFileSchema = z.union([
    z.array(ruleDefinitionSchema),
    z.object({ rules: z.array(ruleDefinitionSchema) }),
]);

/**
 * Validate a parsed rule file and build its rules, keeping file order.
 */
export function parseRuleSet(data: unknown): RuleSet {
    const parsed = ruleFileSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw createInvalidRuleError(`${issue.message}${where}`, { issues: parsed.error.issues.length });
    }
    const definitions = Array.isArray(parsed.data) ? parsed.data : parsed.data.rules;
    return definitions.map((d) => defineRule(d.label, d.required, d.forbidden));
}

/**
 * Parse rule-file text (JSON).
 */
export function parseRuleSetText(text: string): RuleSet {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (e) {
        throw createInvalidRuleError(`not valid JSON (${e instanceof Error ? e.message : String(e)})`);
    }
    return parseRuleSet(data);
}

export function toRuleDefinition(rule: ClassificationRule): RuleDefinition {
    return {
        label: rule.label,
        required: [...rule.required].sort(),
        forbidden: [...rule.forbidden].sort(),
    };
}

/**
 * Molecular-function categories shipped with the tool: enzyme classes,
 * receptors, transporters and a few binding activities.
 */
export function loadDefaultRules(): RuleSet {
    return parseRuleSet(defaultRuleFile);
}
