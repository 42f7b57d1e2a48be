#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import chalk from 'chalk';
import ora from 'ora';
import type { RuleSet } from './types/index.js';
import { AnnotationException, DEFAULTS } from './types/index.js';
import { createContainer } from './container.js';
import { TermGraph } from './ontology/termGraph.js';
import { FileTermStore } from './ontology/termStore.js';
import { loadDefaultRules, parseRuleSetText } from './classification/rules.js';
import { findCoverageOverlaps, validateRules } from './classification/engine.js';
import { readProteinIds, resolveDelimiter, writeTable } from './io/table.js';
import { OUTPUT_COLUMNS, toAnnotationRecord, toClassificationRecord } from './io/rows.js';
import { displayName } from './utils/naming.js';
import { VERSION } from './version.js';

const HELP = `
go-annotate v${VERSION}

Usage:
  go-annotate annotate -i <file> -c <column>   All molecular functions per protein
  go-annotate classify -i <file> -c <column>   One category per protein
  go-annotate term <GO:id>                     Show a term and its ancestors
  go-annotate check-rules                      Check a rule set for problems

Options:
  -i, --infile <file>      Delimited file with protein accessions
  -c, --column <name>      Column holding UniProt accessions
  -o, --outfile <file>     Output file (default: ${DEFAULTS.outFile})
  -s, --separator <sep>    Field delimiter; 'tab' for tabs (default: tab)
  --functions <ids>        annotate: only report these comma-separated GO IDs
  --names <file.json>      annotate: display names by GO ID
  --keep-name              annotate: keep the " activity" suffix
  --rules <file.json>      classify/check-rules: rule file (default: built-in rules)
  --all-matches            classify: every matching category, not just the first
  --coverage               check-rules: report rules claiming the same terms
  --concurrency=<n>        Proteins fetched in parallel
  --cache-dir=<dir>        Reuse fetched GO terms across runs
  --quiet, -q              No progress output
  --help, -h               Show this help
  --version, -v            Show version

Examples:
  go-annotate annotate -i proteins.tsv -c uniprot_id
  go-annotate classify -i targets.csv -c accession -s , --rules my-rules.json
  go-annotate term GO:0016301
`;

const VALUE_OPTIONS: Record<string, string> = {
    '-i': 'infile', '--infile': 'infile',
    '-c': 'column', '--column': 'column',
    '-o': 'outfile', '--outfile': 'outfile',
    '-s': 'separator', '--separator': 'separator',
    '--functions': 'functions',
    '--names': 'names',
    '--rules': 'rules',
    '--concurrency': 'concurrency',
    '--cache-dir': 'cacheDir',
};

const args = process.argv.slice(2);
const options: Record<string, string> = {};
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inline] = arg.includes('=') ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)] : [arg, undefined];
    const key = VALUE_OPTIONS[flag];
    if (key) {
        const value = inline ?? args[++i];
        if (value === undefined) {
            console.error(chalk.red(`Error: ${flag} needs a value`));
            process.exit(1);
        }
        options[key] = value;
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const quiet = args.includes('--quiet') || args.includes('-q');
const commandName = cleanArgs[0];

function fail(message: string): never {
    console.error(chalk.red(`Error: ${message}`));
    process.exit(1);
}

function readRules(): RuleSet {
    return options.rules ? parseRuleSetText(readFileSync(options.rules, 'utf-8')) : loadDefaultRules();
}

function readNames(): Record<string, string> | undefined {
    if (!options.names) return undefined;
    const data: unknown = JSON.parse(readFileSync(options.names, 'utf-8'));
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        fail(`${options.names} must hold a JSON object of GO ID to name`);
    }
    const names: Record<string, string> = {};
    for (const [id, name] of Object.entries(data)) {
        if (typeof name === 'string') names[id] = name;
    }
    return names;
}

function parseConcurrency(): number | undefined {
    if (options.concurrency === undefined) return undefined;
    const n = Number(options.concurrency);
    if (!Number.isInteger(n) || n < 1) {
        fail(`--concurrency must be a positive integer, got '${options.concurrency}'`);
    }
    return n;
}

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    const store = options.cacheDir ? new FileTermStore(options.cacheDir) : undefined;
    const graph = new TermGraph(store ? await store.load() : []);
    const spinner = ora({ isSilent: quiet });
    const container = createContainer({
        graph,
        concurrency: parseConcurrency(),
        simplifyName: !args.includes('--keep-name'),
        alternativeNames: readNames(),
        onProgress: (done, total) => {
            spinner.text = `Resolved ${done}/${total} proteins`;
        },
        logger: {
            warn: (message: string) => {
                if (quiet) return;
                const spinning = spinner.isSpinning;
                spinner.warn(chalk.yellow(message));
                if (spinning) spinner.start();
            },
        },
    });

    try {
        switch (commandName) {
            case 'annotate':
            case 'classify': {
                if (!options.infile) fail("Please specify an input file via '-i'");
                if (!options.column) fail("Please specify the column holding protein accessions via '-c'");

                const delimiter = resolveDelimiter(options.separator);
                const outFile = options.outfile ?? DEFAULTS.outFile;
                const proteinIds = await readProteinIds(options.infile, options.column, delimiter);

                spinner.start(`Resolving ${proteinIds.length} proteins...`);
                if (commandName === 'annotate') {
                    const rows = options.functions
                        ? await container.service.annotateSelected(proteinIds, options.functions.split(',').map((s) => s.trim()))
                        : await container.service.annotateProteins(proteinIds);
                    await writeTable(outFile, OUTPUT_COLUMNS.full, rows.map(toAnnotationRecord), delimiter);
                } else {
                    const rows = await container.service.classifyProteins(proteinIds, readRules(), {
                        allMatches: args.includes('--all-matches'),
                    });
                    await writeTable(outFile, OUTPUT_COLUMNS.category, rows.map(toClassificationRecord), delimiter);
                }
                spinner.succeed(`Wrote ${outFile}`);
                break;
            }
            case 'term': {
                const id = cleanArgs[1];
                if (!id) fail('term argument required');
                const term = await container.resolver.resolveTerm(id);
                console.log(`${chalk.bold(term.id)}  ${term.name}`);
                if (term.definition) console.log(chalk.dim(term.definition));
                const ancestors = [...graph.closure([term.id])].filter((a) => a !== term.id).sort();
                for (const ancestorId of ancestors) {
                    const ancestor = graph.getTerm(ancestorId);
                    if (ancestor) console.log(`  ${ancestor.id}  ${displayName(ancestor, { simplifyName: false })}`);
                }
                break;
            }
            case 'check-rules': {
                const rules = readRules();
                const issues = validateRules(rules);
                for (const issue of issues) {
                    console.log(chalk.yellow(`✗ [${issue.kind}] ${issue.message}`));
                }
                if (args.includes('--coverage')) {
                    spinner.start('Loading rule terms...');
                    await container.resolver.loadTerms(rules.flatMap((r) => [...r.required, ...r.forbidden]));
                    spinner.stop();
                    for (const overlap of findCoverageOverlaps(rules, graph)) {
                        console.log(chalk.yellow(`✗ '${overlap.first}' and '${overlap.second}' both cover ${overlap.terms.join(', ')}`));
                    }
                }
                console.log(issues.length === 0 ? chalk.green(`✓ ${rules.length} rules`) : chalk.red(`${issues.length} problem(s)`));
                process.exitCode = issues.length === 0 ? 0 : 1;
                break;
            }
            default:
                console.error(chalk.red(`Unknown command: ${commandName}`));
                console.log(HELP);
                process.exitCode = 1;
        }
    } catch (e) {
        spinner.fail();
        throw e;
    } finally {
        if (store) await store.save(graph.snapshot());
    }
}

main().catch((e) => {
    if (e instanceof AnnotationException) {
        console.error(chalk.red(`Error [${e.code}]: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.dim(e.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : e);
    }
    process.exit(1);
});
