import { KnowledgeRecord } from '../types';
import { qaContent } from './json-records.parser';

/**
 * One table row keyed by normalised (trimmed, lower-case) column name.
 */
export type TabularRow = Record<string, string>;

export function normaliseHeader(header: string): string {
    return header.trim().toLowerCase();
}

function cell(row: TabularRow, column: string): string {
    return (row[column] ?? '').trim();
}

/**
 * Map rows of a CSV file or spreadsheet sheet onto knowledge records.
 *
 * - `question` + `answer` columns: one Q&A record per row, `category` column or `defaultCategory`;
 * - `product` + `description` columns: one product record per row;
 * - anything else: each row rendered as `column: value` lines.
 */
export function tabularRecords(
    headers: string[],
    rows: TabularRow[],
    defaultCategory: string,
    source: string,
): KnowledgeRecord[] {
    if (headers.includes('question') && headers.includes('answer')) {
        return rows.flatMap((row): KnowledgeRecord[] => {
            const question = cell(row, 'question');
            const answer = cell(row, 'answer');
            if (!question || !answer) {
                return [];
            }
            return [{
                content: qaContent(question, answer),
                category: cell(row, 'category') || defaultCategory,
                source,
                metadata: { question, answer },
            }];
        });
    }

    if (headers.includes('product') && headers.includes('description')) {
        return rows.flatMap((row): KnowledgeRecord[] => {
            const product = cell(row, 'product');
            const description = cell(row, 'description');
            const features = cell(row, 'features');
            if (!product || (!description && !features)) {
                return [];
            }
            const lines = [`Product: ${product}`];
            if (description) {
                lines.push(`Description: ${description}`);
            }
            if (features) {
                lines.push(`Features: ${features}`);
            }
            return [{
                content: lines.join('\n'),
                category: defaultCategory,
                source,
                metadata: { product, description, features },
            }];
        });
    }

    return rows.flatMap((row): KnowledgeRecord[] => {
        const content = headers
            .map((column) => [column, cell(row, column)] as const)
            .filter(([column, value]) => column.length > 0 && value.length > 0)
            .map(([column, value]) => `${column}: ${value}`)
            .join('\n');
        return content ? [{ content, category: defaultCategory, source, metadata: {} }] : [];
    });
}
