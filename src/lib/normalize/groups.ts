import { MARKER_TOKEN } from "./names";

export const GROUP_DELIMITER = ":::";
export const DEFAULT_GROUP = "* myContacts";
/** Group given to records that only the secondary source knows about. */
export const DEFAULT_NEW_GROUP = "🧪 Lab ::: * myContacts";

const STARRED_SUFFIX = "::: * starred";

// Substring replacements, applied in order. A key that contains another key
// must come before it.
const GROUP_LABELS: ReadonlyArray<readonly [legacy: string, canonical: string]> = [
    ["lab ::: * myContacts", "🧪 Lab ::: * myContacts"],
    ["شخصي ::: * myContacts", "🏠 Personal ::: * myContacts"],
    ["* family ::: * myContacts", "👨‍👩‍👧‍👦 Family ::: * myContacts"],
    ["شركات ومندوبين ::: * myContacts", "🏢 Companies & Agents ::: * myContacts"],
    ["اطباء ::: * myContacts", "🧑‍⚕️ Doctors ::: * myContacts"],
    ["وظائف ::: * myContacts", "💼 Jobs ::: * myContacts"],
];

export function normalizeGroupLabel(raw: string | null | undefined): string {
    let label = String(raw ?? "").trim().replace(STARRED_SUFFIX, "").trim();
    for (const [legacy, canonical] of GROUP_LABELS) {
        if (label.includes(legacy)) {
            label = label.split(legacy).join(canonical);
        }
    }
    return label;
}

/**
 * True when any ":::"-separated part of the label mentions the marker word,
 * i.e. the row belongs to the group whose records may be modified.
 */
export function isMarkerGroup(raw: string | null | undefined): boolean {
    const marker = MARKER_TOKEN.toLowerCase();
    return String(raw ?? "")
        .split(GROUP_DELIMITER)
        .map((token) => token.trim().toLowerCase().replace(/[^\p{L}\p{N}_\s]/gu, ""))
        .some((token) => token.includes(marker));
}
