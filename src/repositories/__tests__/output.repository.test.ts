import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";
import { OutputRepository, runTimestamp } from "../output.repository";
import { AuditEntry, MergeSummary } from "../../types/merge.types";

const SUMMARY: MergeSummary = { primary: 1, secondary: 1, total: 1, created: 0, merged: 1, protected: 0 };

const ENTRY: AuditEntry = {
    targetName: "Hany Lab",
    originalSnapshot: null,
    update: {
        secondaryName: "Hany Lab",
        secondaryOriginalName: "Hany",
        addedNumbers: ["+201055555555"],
        addedFirstName: true,
        addedLastName: true,
    },
    finalState: {
        name: "Hany Lab",
        phones: ["+201044444444", "+201055555555"],
        groups: "🧪 Lab ::: * myContacts",
        sources: "Primary & Secondary",
        duplicates: "Hany",
    },
};

describe("runTimestamp", () => {
    it("formats local time as date_time", () => {
        expect(runTimestamp(new Date(2026, 9, 19, 8, 5, 3))).toBe("20261019_080503");
    });
});

describe("OutputRepository.writeRun", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), "merge-output-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("writes the contacts file and both audit files", async () => {
        const out = path.join(dir, "nested");
        const files = await OutputRepository.writeRun(out, "20261019_080503", {
            contactsCsv: "First Name\nHany Lab",
            auditLog: [ENTRY],
            summary: SUMMARY,
        });

        expect(files).toEqual({
            contacts: path.join(out, "merged_contacts_20261019_080503.csv"),
            auditJson: path.join(out, "merge_log_20261019_080503.json"),
            auditCsv: path.join(out, "merge_log_20261019_080503.csv"),
        });

        expect(await readFile(path.join(out, "merged_contacts_20261019_080503.csv"), "utf8")).toBe(
            "\ufeffFirst Name\nHany Lab"
        );

        const log: unknown = JSON.parse(await readFile(path.join(out, "merge_log_20261019_080503.json"), "utf8"));
        expect(log).toEqual({ summary: SUMMARY, details: [ENTRY] });

        const auditCsv = await readFile(path.join(out, "merge_log_20261019_080503.csv"), "utf8");
        expect(auditCsv.split("\n")[1]).toBe(
            'Hany Lab,Hany Lab,Hany,+201055555555,true,true,"+201044444444, +201055555555",🧪 Lab ::: * myContacts,Primary & Secondary,Hany'
        );
    });

    it("writes nothing but the directory on a dry run without updates", async () => {
        const files = await OutputRepository.writeRun(dir, "20261019_080503", { auditLog: [], summary: SUMMARY });

        expect(files).toEqual({});
        expect(await readdir(dir)).toEqual([]);
    });
});
