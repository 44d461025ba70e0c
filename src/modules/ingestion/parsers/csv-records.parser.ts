import csv from 'csv-parser';
import * as path from 'path';
import { Readable } from 'stream';
import { KnowledgeRecord } from '../types';
import { normaliseHeader, TabularRow, tabularRecords } from './tabular-records';

function readRows(buffer: Buffer): Promise<{ headers: string[]; rows: TabularRow[] }> {
    return new Promise((resolve, reject) => {
        let headers: string[] = [];
        const rows: TabularRow[] = [];
        Readable.from(buffer)
            .pipe(csv({ mapHeaders: ({ header }) => normaliseHeader(header) }))
            .on('headers', (parsed: string[]) => {
                headers = parsed;
            })
            .on('data', (row: TabularRow) => {
                rows.push(row);
            })
            .on('end', () => resolve({ headers, rows }))
            .on('error', (err: Error) => reject(err));
    });
}

/**
 * Parse a CSV knowledge file. Records without a `category` column take the file name.
 */
export async function parseCsvRecords(buffer: Buffer, fileName: string): Promise<KnowledgeRecord[]> {
    const { headers, rows } = await readRows(buffer);
    return tabularRecords(headers, rows, path.parse(fileName).name, fileName);
}
