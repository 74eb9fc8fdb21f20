import Papa from 'papaparse';
import { FileParseError } from './errors';
import type { FileSpec, ParsedColumn } from './types';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const MISSING = new Set(['', 'NA']);
const NON_FINITE = new Set(['Inf', '+Inf', '-Inf', 'NaN']);

const isBlankRow = (row: string[]): boolean => row.every(field => field.trim() === '');

/**
 * Parses an uploaded text file holding a single column of numbers.
 * Rows are numbered by physical line, so a quoted field spanning lines shifts
 * the reported line of later rows.
 */
export function parseNumericColumn({ name, text, hasHeader }: FileSpec): ParsedColumn {
    const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
        delimiter: ',',
        skipEmptyLines: false,
    });

    const [firstError] = result.errors;
    if (firstError) {
        throw new FileParseError(firstError.message, name, firstError.row === undefined ? undefined : firstError.row + 1);
    }

    const rows = result.data
        .map((fields, index) => ({ fields, line: index + 1 }))
        .filter(({ fields }) => !isBlankRow(fields));

    if (rows.length === 0) {
        throw new FileParseError('file is empty', name);
    }

    for (const { fields, line } of rows) {
        if (fields.length !== 1) {
            throw new FileParseError(`expected exactly one column, found ${fields.length}`, name, line);
        }
    }

    let columnName = 'V1';
    let dataRows = rows;
    if (hasHeader) {
        columnName = rows[0].fields[0].trim() || columnName;
        dataRows = rows.slice(1);
    }

    const values: number[] = [];
    let missing = 0;
    let nonFinite = 0;
    dataRows.forEach(({ fields, line }, index) => {
        const raw = fields[0].trim();
        if (MISSING.has(raw)) {
            missing++;
            return;
        }
        // Read as numbers, but a histogram has no bin for them.
        if (NON_FINITE.has(raw)) {
            nonFinite++;
            return;
        }
        if (!DECIMAL.test(raw)) {
            const hint = !hasHeader && index === 0 ? ' (if the first row is a header, tick the header checkbox)' : '';
            throw new FileParseError(`"${raw}" is not a number${hint}`, name, line);
        }
        const value = Number(raw);
        if (!Number.isFinite(value)) {
            nonFinite++;
            return;
        }
        values.push(value);
    });

    if (missing > 0) {
        console.warn(`${name}: dropped ${missing} missing value(s)`);
    }
    if (nonFinite > 0) {
        console.warn(`${name}: dropped ${nonFinite} non-finite value(s)`);
    }
    if (values.length === 0) {
        throw new FileParseError('no numeric values found', name);
    }

    return { columnName, values };
}
