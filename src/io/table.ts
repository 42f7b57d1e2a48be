/**
 * Delimited text tables (TSV by default)
 */

import fs from 'fs/promises';
import { DEFAULTS } from '../types/options.js';
import { createInvalidInputError } from '../types/errors.js';
import { unique } from '../utils/batch.js';

export interface Table {
    columns: string[];
    rows: Record<string, string>[];
}

/**
 * Resolve the user-facing delimiter argument; "tab" means a tab character.
 */
export function resolveDelimiter(value?: string): string {
    if (!value || value === 'tab' || value === '\\t') return DEFAULTS.delimiter;
    return value;
}

/**
 * Split one line on the delimiter, honouring double-quoted fields.
 */
export function splitLine(line: string, delimiter: string): string[] {
    const fields: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quoted) {
            if (ch === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                current += ch;
            }
        } else if (ch === '"' && current === '') {
            quoted = true;
        } else if (line.startsWith(delimiter, i)) {
            fields.push(current);
            current = '';
            i += delimiter.length - 1;
        } else {
            current += ch;
        }
    }
    fields.push(current);
    return fields;
}

export function parseTable(text: string, delimiter: string = DEFAULTS.delimiter): Table {
    const lines = text.split(/\r?\n/).filter((l) => l.trim() !== '');
    if (lines.length === 0) {
        return { columns: [], rows: [] };
    }
    const columns = splitLine(lines[0], delimiter).map((c) => c.trim());
    const rows = lines.slice(1).map((line) => {
        const fields = splitLine(line, delimiter);
        const row: Record<string, string> = {};
        columns.forEach((column, i) => {
            row[column] = (fields[i] ?? '').trim();
        });
        return row;
    });
    return { columns, rows };
}

/**
 * Distinct non-empty values of one column, in file order.
 */
export function extractColumn(table: Table, column: string): string[] {
    if (!table.columns.includes(column)) {
        throw createInvalidInputError(`Column '${column}' not found`, { available: table.columns });
    }
    return unique(table.rows.map((row) => row[column]).filter((v) => v !== ''));
}

export async function readProteinIds(
    file: string,
    column: string,
    delimiter: string = DEFAULTS.delimiter
): Promise<string[]> {
    const text = await fs.readFile(file, 'utf-8');
    return extractColumn(parseTable(text, delimiter), column);
}

function escapeField(value: string, delimiter: string): string {
    if (value.includes(delimiter) || value.includes('"') || value.includes('\n')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function formatTable(
    columns: readonly string[],
    rows: readonly Record<string, string | undefined>[],
    delimiter: string = DEFAULTS.delimiter
): string {
    const lines = [columns.join(delimiter)];
    for (const row of rows) {
        lines.push(columns.map((c) => escapeField(row[c] ?? '', delimiter)).join(delimiter));
    }
    return lines.join('\n') + '\n';
}

export async function writeTable(
    file: string,
    columns: readonly string[],
    rows: readonly Record<string, string | undefined>[],
    delimiter: string = DEFAULTS.delimiter
): Promise<void> {
    await fs.writeFile(file, formatTable(columns, rows, delimiter), 'utf-8');
}
