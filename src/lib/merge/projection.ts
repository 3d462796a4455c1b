import { ContactRecord } from "../../types/contact.types";
import { AuditEntry, MergeSummary } from "../../types/merge.types";
import { DEFAULT_GROUP, normalizeGroupLabel } from "../normalize/groups";
import { DEFAULT_COUNTRY_CODE, expandAndNormalize } from "../normalize/phone";

export const DEFAULT_PHONE_SLOTS = 4;
const DEFAULT_PHONE_TYPE = "Mobile";
const DUPLICATES_LABEL = "Duplicate Names";
const SOURCES_LABEL = "Sources";

export interface ProjectionOptions {
    maxPhoneSlots?: number;
    defaultCountryCode?: string;
}

const phoneValue = (slot: number) => `Phone ${slot} - Value`;
const phoneType = (slot: number) => `Phone ${slot} - Type`;

export function requiredColumns(maxPhoneSlots = DEFAULT_PHONE_SLOTS): string[] {
    const phones: string[] = [];
    for (let slot = 1; slot <= maxPhoneSlots; slot++) {
        phones.push(phoneType(slot), phoneValue(slot));
    }
    return [
        "First Name",
        "Middle Name",
        "Last Name",
        "Group Membership",
        ...phones,
        "Labels",
        "Custom Field 1 - Label",
        "Custom Field 1 - Value",
        "Custom Field 2 - Label",
        "Custom Field 2 - Value",
    ];
}

/**
 * Export header: the primary file's own columns (without the combined
 * "Name" column) followed by any required column it lacks.
 */
export function exportColumns(template: readonly string[] = [], maxPhoneSlots = DEFAULT_PHONE_SLOTS): string[] {
    const columns = template.filter((c) => c && c !== "Name");
    for (const col of requiredColumns(maxPhoneSlots)) {
        if (!columns.includes(col)) columns.push(col);
    }
    return columns;
}

export function projectRow(
    record: ContactRecord,
    columns: readonly string[],
    options: ProjectionOptions = {}
): Record<string, string> {
    const maxSlots = options.maxPhoneSlots ?? DEFAULT_PHONE_SLOTS;
    const cc = options.defaultCountryCode ?? DEFAULT_COUNTRY_CODE;
    const phoneOptions = { defaultCountryCode: cc };

    const groups = normalizeGroupLabel([...record.groups].sort().join(" ::: ") || DEFAULT_GROUP);
    const sources = [...record.sources].sort().join(" & ");
    const duplicates = [...record.duplicates].sort().join(" - ");

    const row: Record<string, string> = {};
    for (const col of columns) row[col] = record.snapshot?.[col] ?? "";
    if (!row["First Name"] && !row["Middle Name"] && !row["Last Name"]) {
        row["First Name"] = record.name;
    }

    const slots: string[] = [];
    for (let slot = 1; slot <= maxSlots; slot++) slots.push(row[phoneValue(slot)] ?? "");
    const existing = expandAndNormalize(slots, phoneOptions);
    const incoming = expandAndNormalize(record.numbers, phoneOptions);

    const phones = [...new Set([...existing, ...incoming])]
        .slice(0, maxSlots)
        .filter((p) => p !== cc);

    for (let slot = 1; slot <= maxSlots; slot++) row[phoneValue(slot)] = "";
    phones.forEach((phone, i) => {
        row[phoneValue(i + 1)] = phone;
        if (!row[phoneType(i + 1)]) row[phoneType(i + 1)] = DEFAULT_PHONE_TYPE;
    });

    row["Labels"] = groups;
    if (!row["Custom Field 1 - Label"]) row["Custom Field 1 - Label"] = DUPLICATES_LABEL;
    row["Custom Field 1 - Value"] = duplicates;
    if (!row["Custom Field 2 - Label"]) row["Custom Field 2 - Label"] = SOURCES_LABEL;
    row["Custom Field 2 - Value"] = sources;

    return row;
}

export const AUDIT_COLUMNS = [
    "Primary Contact",
    "Secondary Name",
    "Secondary Original Name",
    "Added Numbers",
    "Added First Name",
    "Added Last Name",
    "Final Phone Numbers",
    "Final Group Membership",
    "Final Sources",
    "Final Duplicates",
] as const;

export type AuditRow = Record<(typeof AUDIT_COLUMNS)[number], string>;

export function projectAuditRow(entry: AuditEntry): AuditRow {
    return {
        "Primary Contact": entry.targetName,
        "Secondary Name": entry.update.secondaryName,
        "Secondary Original Name": entry.update.secondaryOriginalName,
        "Added Numbers": entry.update.addedNumbers.join(", "),
        "Added First Name": String(entry.update.addedFirstName),
        "Added Last Name": String(entry.update.addedLastName),
        "Final Phone Numbers": entry.finalState.phones.join(", "),
        "Final Group Membership": entry.finalState.groups,
        "Final Sources": entry.finalState.sources,
        "Final Duplicates": entry.finalState.duplicates,
    };
}

export function summarize(
    merged: ReadonlyMap<string, ContactRecord>,
    primaryCount: number,
    secondaryCount: number
): MergeSummary {
    let created = 0;
    let both = 0;
    let protectedCount = 0;

    for (const record of merged.values()) {
        const fromPrimary = record.sources.has("Primary");
        const fromSecondary = record.sources.has("Secondary");
        if (fromSecondary && !fromPrimary) created++;
        if (fromSecondary && fromPrimary) both++;
        if (record.protected) protectedCount++;
    }

    return {
        primary: primaryCount,
        secondary: secondaryCount,
        total: merged.size,
        created,
        merged: both,
        protected: protectedCount,
    };
}
