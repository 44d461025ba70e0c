import { z } from 'zod';
import { UnsupportedUploadError } from '../../../common/errors/rag.errors';
import { errorMessage } from '../../../common/utils/error.util';
import { KnowledgeRecord } from '../types';

const DEFAULT_CATEGORY = 'Uncategorized';

const categorizedFileSchema = z.object({
    categories: z.array(
        z.object({
            category: z.string().optional(),
            questions: z
                .array(z.object({ question: z.string().optional(), answer: z.string().optional() }))
                .default([]),
        }),
    ),
});

const flatRecordSchema = z.union([
    z.object({
        category: z.string().optional(),
        question: z.string().min(1),
        answer: z.string().min(1),
    }),
    z.object({
        category: z.string().optional(),
        content: z.string().min(1),
        source: z.string().optional(),
    }),
]);

const flatFileSchema = z.array(flatRecordSchema);

export function qaContent(question: string, answer: string): string {
    return `Question: ${question}\nAnswer: ${answer}`;
}

/**
 * Parse a JSON knowledge file.
 *
 * Accepts `{ categories: [{ category, questions: [{ question, answer }] }] }`, where
 * incomplete question/answer pairs are skipped, or an array of
 * `{ category?, question, answer }` / `{ category?, content, source? }` records.
 */
export function parseJsonRecords(raw: string, fileName: string): KnowledgeRecord[] {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new UnsupportedUploadError(`${fileName} is not valid JSON: ${errorMessage(error)}`);
    }

    const categorized = categorizedFileSchema.safeParse(data);
    if (categorized.success) {
        return categorized.data.categories.flatMap(({ category, questions }) =>
            questions.flatMap(({ question, answer }): KnowledgeRecord[] =>
                question && answer
                    ? [{
                        content: qaContent(question, answer),
                        category: category || DEFAULT_CATEGORY,
                        source: fileName,
                        metadata: { question, answer },
                    }]
                    : [],
            ),
        );
    }

    const flat = flatFileSchema.safeParse(data);
    if (flat.success) {
        return flat.data.map((record): KnowledgeRecord => {
            const category = record.category || DEFAULT_CATEGORY;
            if ('content' in record) {
                return { content: record.content, category, source: record.source || fileName, metadata: {} };
            }
            return {
                content: qaContent(record.question, record.answer),
                category,
                source: fileName,
                metadata: { question: record.question, answer: record.answer },
            };
        });
    }

    throw new UnsupportedUploadError(`${fileName} does not match a supported JSON knowledge format`);
}
