import { Tool } from '@modelcontextprotocol/sdk/types.js';

const proteinIdsSchema = {
    type: 'array',
    items: { type: 'string' },
    description: 'UniProt accessions, e.g. ["Q16512", "P30085"]',
};

const rulesSchema = {
    type: 'array',
    description: 'Classification rules in evaluation order. The first matching rule wins. Default: the built-in molecular-function categories.',
    items: {
        type: 'object',
        properties: {
            label: { type: 'string', description: 'Category name' },
            required: { type: 'array', items: { type: 'string' }, description: 'GO IDs the protein must carry' },
            forbidden: { type: 'array', items: { type: 'string' }, description: 'GO IDs the protein must not carry' },
        },
        required: ['label'],
    },
};

export const TOOLS: Tool[] = [
    {
        name: 'annotate-proteins',
        description: `List every molecular function of the given proteins, including functions implied by the GO hierarchy.

**When to use:** You need the full set of GO molecular-function terms for proteins.
**When NOT to use:** You only need a category per protein (use classify-proteins instead).

**Example:**
  protein_ids: ["Q16512"]
  → Returns rows such as { uniprotId: "Q16512", goId: "GO:0016301", proteinFunction: "kinase" }

**Notes:**
- A protein without molecular-function annotation yields a single "no_function" row
- Unknown accessions yield an "error" row; the rest of the batch still runs`,
        inputSchema: {
            type: 'object',
            properties: {
                protein_ids: proteinIdsSchema,
                functions: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Only report these GO IDs (selected-function query).',
                },
                simplify_name: {
                    type: 'boolean',
                    description: 'Strip the trailing " activity" from function names. Default: true.',
                },
                alternative_names: {
                    type: 'object',
                    additionalProperties: { type: 'string' },
                    description: 'Display names by GO ID, overriding the ontology names.',
                },
                include_root: {
                    type: 'boolean',
                    description: 'Keep the "molecular_function" root term (GO:0003674). Default: false.',
                },
            },
            required: ['protein_ids'],
        },
    },
    {
        name: 'classify-proteins',
        description: `Assign each protein to a functional category using required/forbidden GO term rules.

**When to use:** Grouping proteins into classes such as "Kinase" or "Peptidase".

**Example:**
  protein_ids: ["Q16512"]
  rules: [{ label: "Protein kinase", required: ["GO:0004672"] }, { label: "Non-kinase", forbidden: ["GO:0016301"] }]
  → Returns: { rows: [{ uniprotId: "Q16512", proteinFunction: "Protein kinase" }] }

**Common issues:**
- Rules with no required terms match everything they do not forbid; put them last`,
        inputSchema: {
            type: 'object',
            properties: {
                protein_ids: proteinIdsSchema,
                rules: rulesSchema,
                all_matches: {
                    type: 'boolean',
                    description: 'Report every matching category instead of the first. Default: false.',
                },
            },
            required: ['protein_ids'],
        },
    },
    {
        name: 'get-term',
        description: 'Look up a GO molecular-function term by ID, optionally with all of its ancestors.',
        inputSchema: {
            type: 'object',
            properties: {
                go_id: { type: 'string', description: 'GO identifier, e.g. GO:0016301' },
                include_ancestors: { type: 'boolean', description: 'Include every ancestor term. Default: false.' },
            },
            required: ['go_id'],
        },
    },
    {
        name: 'check-rules',
        description: `Check a rule set for rules that can never match, duplicate labels and, optionally, rules that claim the same GO terms.

**When to use:** Before classifying with a hand-written rule set.`,
        inputSchema: {
            type: 'object',
            properties: {
                rules: rulesSchema,
                coverage: {
                    type: 'boolean',
                    description: 'Also report rule pairs whose covered terms overlap (loads the rule terms). Default: false.',
                },
            },
        },
    },
];
