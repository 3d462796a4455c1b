import { readCsvTable } from "../lib/csv";
import { DEFAULT_GROUP, isMarkerGroup, normalizeGroupLabel } from "../lib/normalize/groups";
import { comparisonKeyOf, normalizeDisplayName } from "../lib/normalize/names";
import { expandAndNormalize, PhoneOptions } from "../lib/normalize/phone";
import { PrimaryInput } from "../types/contact.types";

const PHONE_COLUMNS = Array.from({ length: 9 }, (_, i) => `Phone ${i + 1} - Value`);

export interface LoadedPrimary {
    // Header of the export, reused as the template for the merged file.
    columns: string[];
    contacts: Map<string, PrimaryInput>;
}

export const PrimarySourceRepository = {

    fromCsv(text: string, options: PhoneOptions = {}): LoadedPrimary {
        const { columns, records } = readCsvTable(text);
        return {
            columns,
            contacts: PrimarySourceRepository.fromRecords(records, options),
        };
    },

    /**
     * One entry per named row, keyed by display name. Rows of the marker group
     * get the marker suffix and stay modifiable; every other row is protected.
     */
    fromRecords(records: Record<string, string>[], options: PhoneOptions = {}): Map<string, PrimaryInput> {
        const contacts = new Map<string, PrimaryInput>();

        for (const row of records) {
            const first = (row["First Name"] ?? "").trim();
            const middle = (row["Middle Name"] ?? "").trim();
            const last = (row["Last Name"] ?? "").trim();

            let rawName = (row["Name"] ?? "").trim();
            if (!rawName) rawName = [first, middle, last].filter(Boolean).join(" ");
            if (!rawName) continue;

            const groupsRaw = (row["Labels"] || row["Group Membership"] || DEFAULT_GROUP).trim();
            const eligible = isMarkerGroup(groupsRaw);
            const name = normalizeDisplayName(rawName, eligible, true);

            contacts.set(name, {
                numbers: expandAndNormalize(PHONE_COLUMNS.map((col) => row[col]), options),
                groups: [normalizeGroupLabel(groupsRaw)],
                protected: !eligible,
                comparisonKey: comparisonKeyOf(name),
                firstName: first,
                middleName: middle,
                lastName: last,
                snapshot: { ...row },
            });
        }

        return contacts;
    },

};
