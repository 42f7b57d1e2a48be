import { z } from 'zod';
import type { RuleDefinition, RuleIssue, RuleOverlap } from '../types/index.js';
import type { AnnotationContainer } from '../container.js';
import { findCoverageOverlaps, validateRules } from '../classification/engine.js';
import { toRuleDefinition } from '../classification/rules.js';
import { parseArgs, ruleArgSchema, rulesOrDefault } from './utils.js';

const checkRulesArgsSchema = z.object({
    rules: ruleArgSchema.optional(),
    coverage: z.boolean().optional(),
});

export interface CheckRulesResponse {
    valid: boolean;
    rules: RuleDefinition[];
    issues: RuleIssue[];
    overlaps?: RuleOverlap[];
}

/**
 * Report dead rules, duplicate labels and, with `coverage`, rule pairs
 * that claim the same terms among those loaded so far.
 */
export async function checkRulesHandler(
    args: unknown,
    container: AnnotationContainer
): Promise<CheckRulesResponse> {
    const { rules, coverage } = parseArgs(checkRulesArgsSchema, args);
    const ruleSet = rulesOrDefault(rules, container.defaultRules);
    const issues = validateRules(ruleSet);

    const response: CheckRulesResponse = {
        valid: issues.length === 0,
        rules: ruleSet.map(toRuleDefinition),
        issues,
    };
    if (coverage) {
        await container.resolver.loadTerms(ruleSet.flatMap((r) => [...r.required, ...r.forbidden]));
        response.overlaps = findCoverageOverlaps(ruleSet, container.graph);
    }
    return response;
}
