import type { AnnotationRow, ClassificationRow, OutputMode } from '../types/responses.js';

export const OUTPUT_COLUMNS: Record<OutputMode, readonly string[]> = {
    full: ['uniprot_id', 'go_id', 'protein_function'],
    category: ['uniprot_id', 'protein_function'],
};

function functionCell(row: { proteinFunction: string; error?: string }): string {
    return row.error ? `${row.proteinFunction} (${row.error})` : row.proteinFunction;
}

export function toAnnotationRecord(row: AnnotationRow): Record<string, string | undefined> {
    return {
        uniprot_id: row.uniprotId,
        go_id: row.goId,
        protein_function: functionCell(row),
    };
}

export function toClassificationRecord(row: ClassificationRow): Record<string, string | undefined> {
    return {
        uniprot_id: row.uniprotId,
        protein_function: functionCell(row),
    };
}
