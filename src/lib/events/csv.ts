/**
 * Minimal CSV reader/writer for event import and the import template.
 *
 * Handles quoted fields, doubled quotes inside quotes, embedded newlines
 * and CRLF/LF line endings. A leading UTF-8 BOM is dropped.
 */

export function stripBom(text: string): string {
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Split CSV text into rows of raw field strings
 */
export function parseCsv(text: string): string[][] {
    const input = stripBom(text);
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < input.length; i++) {
        const ch = input[i];

        if (inQuotes) {
            if (ch === '"') {
                if (input[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            row.push(field);
            field = '';
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && input[i + 1] === '\n') i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field !== '' || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}

/**
 * Parse CSV with a header row into records. Blank lines are dropped;
 * missing trailing fields become ''.
 *
 * Each record carries the 1-based line number of its row in the file
 * (the header is line 1).
 */
export function parseCsvRecords(text: string): Array<{ line: number; values: Record<string, string> }> {
    const rows = parseCsv(text);
    if (rows.length === 0) return [];

    const headers = rows[0].map(h => h.trim());
    const records: Array<{ line: number; values: Record<string, string> }> = [];

    rows.slice(1).forEach((row, i) => {
        if (row.length === 1 && row[0].trim() === '') return;

        const values: Record<string, string> = {};
        headers.forEach((header, col) => {
            values[header] = row[col] ?? '';
        });
        records.push({ line: i + 2, values });
    });

    return records;
}

function escapeField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(headers: readonly string[], rows: ReadonlyArray<Record<string, string>>): string {
    const lines = [headers.map(escapeField).join(',')];
    for (const row of rows) {
        lines.push(headers.map(h => escapeField(row[h] ?? '')).join(','));
    }
    return lines.join('\r\n') + '\r\n';
}
