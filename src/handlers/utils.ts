import { z } from 'zod';
import type { RuleSet } from '../types/index.js';
import { createInvalidInputError } from '../types/index.js';
import { parseRuleSet } from '../classification/rules.js';

/**
 * Validate tool arguments, reporting the first problem as INVALID_INPUT
 */
export function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? `'${issue.path.join('.')}': ` : '';
        throw createInvalidInputError(`Invalid arguments: ${where}${issue.message}`);
    }
    return parsed.data;
}

export const ruleArgSchema = z.array(z.object({
    label: z.string(),
    required: z.array(z.string()).optional(),
    forbidden: z.array(z.string()).optional(),
}));

/**
 * Rules given inline with a tool call, or the defaults when absent
 */
export function rulesOrDefault(rules: unknown[] | undefined, defaults: RuleSet): RuleSet {
    return rules === undefined ? defaults : parseRuleSet(rules);
}
