import { Workbook, Worksheet } from 'exceljs';
import { UnsupportedUploadError } from '../../../common/errors/rag.errors';
import { errorMessage } from '../../../common/utils/error.util';
import { KnowledgeRecord } from '../types';
import { normaliseHeader, TabularRow, tabularRecords } from './tabular-records';

// exceljs types its input as an ArrayBuffer.
function toArrayBuffer(buffer: Buffer): ArrayBuffer {
    const copy = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(copy).set(buffer);
    return copy;
}

function readSheet(sheet: Worksheet): { headers: string[]; rows: TabularRow[] } {
    const headers: string[] = [];
    const rows: TabularRow[] = [];

    sheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) {
            for (let col = 1; col <= row.cellCount; col++) {
                headers.push(normaliseHeader(row.getCell(col).text));
            }
            return;
        }

        const values: TabularRow = {};
        headers.forEach((header, i) => {
            if (header) {
                values[header] = row.getCell(i + 1).text;
            }
        });
        rows.push(values);
    });

    return { headers, rows };
}

/**
 * Parse an .xlsx workbook. Every sheet is read with the CSV row formats; the sheet name
 * is the category unless a `category` column says otherwise.
 */
export async function parseSpreadsheetRecords(buffer: Buffer, fileName: string): Promise<KnowledgeRecord[]> {
    const workbook = new Workbook();
    try {
        await workbook.xlsx.load(toArrayBuffer(buffer));
    } catch (error) {
        throw new UnsupportedUploadError(`${fileName} is not a readable spreadsheet: ${errorMessage(error)}`);
    }

    return workbook.worksheets.flatMap((sheet) => {
        const { headers, rows } = readSheet(sheet);
        return tabularRecords(headers, rows, sheet.name, fileName);
    });
}
