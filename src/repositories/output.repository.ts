import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { writeCsv } from "../lib/csv";
import { AUDIT_COLUMNS, projectAuditRow } from "../lib/merge/projection";
import { AuditEntry, MergeSummary } from "../types/merge.types";

const UTF8_BOM = "\ufeff";

export interface RunOutput {
    // Omitted on dry runs.
    contactsCsv?: string;
    auditLog: AuditEntry[];
    summary: MergeSummary;
}

export interface WrittenFiles {
    contacts?: string;
    auditJson?: string;
    auditCsv?: string;
}

/** "20261019_104512" in local time. */
export function runTimestamp(date: Date = new Date()): string {
    const pad = (n: number) => String(n).padStart(2, "0");
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

export const OutputRepository = {

    async writeRun(dir: string, timestamp: string, output: RunOutput): Promise<WrittenFiles> {
        await mkdir(dir, { recursive: true });
        const files: WrittenFiles = {};

        if (output.contactsCsv !== undefined) {
            files.contacts = path.join(dir, `merged_contacts_${timestamp}.csv`);
            await writeFile(files.contacts, UTF8_BOM + output.contactsCsv, "utf8");
        }

        if (!output.auditLog.length) return files;

        files.auditJson = path.join(dir, `merge_log_${timestamp}.json`);
        const details = { summary: output.summary, details: output.auditLog };
        await writeFile(files.auditJson, JSON.stringify(details, null, 2), "utf8");

        files.auditCsv = path.join(dir, `merge_log_${timestamp}.csv`);
        const rows = output.auditLog.map(projectAuditRow);
        await writeFile(files.auditCsv, UTF8_BOM + writeCsv(AUDIT_COLUMNS, rows), "utf8");

        return files;
    },

};
