/**
 * csv.ts
 * RFC 4180 style encoding for the ledger file: comma separated, fields with
 * commas, quotes or line breaks are double-quoted, quotes doubled.
 */

export function encodeField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function encodeRow(fields: string[]): string {
    return fields.map(encodeField).join(',');
}

/**
 * Parse CSV text into rows. Quoted fields may span lines.
 * A trailing newline does not produce an empty row.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    let i = 0;

    const endField = () => { row.push(field); field = ''; };
    const endRow = () => { endField(); rows.push(row); row = []; };

    while (i < text.length) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') { field += '"'; i += 2; continue; }
                inQuotes = false;
                i++;
                continue;
            }
            field += ch;
            i++;
            continue;
        }

        if (ch === '"') { inQuotes = true; i++; continue; }
        if (ch === ',') { endField(); i++; continue; }
        if (ch === '\r' && text[i + 1] === '\n') { endRow(); i += 2; continue; }
        if (ch === '\n' || ch === '\r') { endRow(); i++; continue; }

        field += ch;
        i++;
    }

    if (field !== '' || row.length > 0) endRow();

    return rows;
}

/**
 * Rows -> objects keyed by the header row. Missing cells come back as ''.
 */
export function parseCsvRecords(text: string): { header: string[]; records: Record<string, string>[] } {
    const [header = [], ...body] = parseCsv(text);
    const records = body
        .filter(cells => !(cells.length === 1 && cells[0] === ''))
        .map(cells => {
            const record: Record<string, string> = {};
            header.forEach((name, idx) => { record[name] = cells[idx] ?? ''; });
            return record;
        });
    return { header, records };
}
