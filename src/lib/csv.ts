import * as XLSX from "xlsx";

export interface CsvTable {
    columns: string[];
    records: Record<string, string>[];
}

/**
 * Decodes exported CSV bytes. UTF-16 is recognized by its BOM; anything that
 * is not valid UTF-8 is read as Windows-1252.
 */
export function decodeText(data: Uint8Array): string {
    if (data.length >= 2 && data[0] === 0xff && data[1] === 0xfe) {
        return new TextDecoder("utf-16le").decode(data);
    }
    if (data.length >= 2 && data[0] === 0xfe && data[1] === 0xff) {
        return new TextDecoder("utf-16be").decode(data);
    }
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(data);
    } catch (err) {
        if (!(err instanceof TypeError)) throw err;
        return new TextDecoder("windows-1252").decode(data);
    }
}

export function cleanHeader(cell: string): string {
    return cell.replace(/\ufeff/g, "").replace(/\u00ff\u00fe/g, "").trim();
}

/** Every non-blank line as an array of cell strings, header included. */
export function readCsvRows(text: string): string[][] {
    const body = text.replace(/^\ufeff/, "");
    if (!body.trim()) return [];

    const workbook = XLSX.read(body, { type: "string", raw: true });
    const first = workbook.SheetNames[0];
    const sheet = first === undefined ? undefined : workbook.Sheets[first];
    if (!sheet) return [];

    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: "",
        blankrows: false,
    });
    return rows.map((row) => row.map((cell) => (cell == null ? "" : String(cell))));
}

/** Rows keyed by the (cleaned) header line. */
export function readCsvTable(text: string): CsvTable {
    const [header, ...rows] = readCsvRows(text);
    if (!header) return { columns: [], records: [] };

    const columns = header.map(cleanHeader);
    const records = rows.map((row) => {
        const record: Record<string, string> = {};
        columns.forEach((col, i) => {
            if (col && !(col in record)) record[col] = row[i] ?? "";
        });
        return record;
    });
    return { columns, records };
}

export function writeCsv(columns: readonly string[], records: readonly Record<string, string>[]): string {
    const aoa = [[...columns], ...records.map((r) => columns.map((c) => r[c] ?? ""))];
    const sheet = XLSX.utils.aoa_to_sheet(aoa);
    return XLSX.utils.sheet_to_csv(sheet);
}
