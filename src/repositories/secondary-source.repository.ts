import { readCsvRows } from "../lib/csv";
import { MARKER_TOKEN, comparisonKeyOf, normalizeDisplayName } from "../lib/normalize/names";
import { expandAndNormalize, PhoneOptions } from "../lib/normalize/phone";
import { SecondaryInput, SecondarySource } from "../types/contact.types";

export interface SecondaryRow {
    name: string;
    phones: string[];
}

export const SecondarySourceRepository = {

    /** First column is the full name; every other column may hold numbers. */
    fromCsv(text: string, options: PhoneOptions = {}): Map<string, SecondaryInput> {
        const [, ...rows] = readCsvRows(text);
        return SecondarySourceRepository.fromRows(
            rows.map(([name = "", ...phones]) => ({ name, phones })),
            options
        );
    },

    /**
     * Rows without a valid number are dropped. Rows whose names normalize to
     * the same display name share one entry.
     */
    fromRows(rows: SecondaryRow[], options: PhoneOptions = {}): Map<string, SecondaryInput> {
        const contacts = new Map<string, SecondaryInput>();

        for (const row of rows) {
            const full = row.name.trim();
            const numbers = expandAndNormalize(row.phones.filter(Boolean), options);
            if (!numbers.length) continue;

            const [first = "", ...rest] = full.split(/\s+/).filter(Boolean);
            const middle = rest.join(" ");
            const display = normalizeDisplayName([first, middle, MARKER_TOKEN].filter(Boolean).join(" "));

            const existing = contacts.get(display);
            if (existing) {
                existing.numbers = [...new Set([...existing.numbers, ...numbers])];
                continue;
            }

            contacts.set(display, {
                numbers,
                firstName: first,
                middleName: middle,
                lastName: MARKER_TOKEN,
                originalName: full,
                comparisonKey: comparisonKeyOf(display),
            });
        }

        return contacts;
    },

    /**
     * Folds several loaded batches into one source. Numbers accumulate; name
     * parts come from the last batch that has the contact.
     */
    combine(batches: Iterable<SecondarySource>): Map<string, SecondaryInput> {
        const combined = new Map<string, SecondaryInput>();

        for (const batch of batches) {
            for (const [name, input] of batch) {
                const prev = combined.get(name);
                combined.set(name, {
                    ...input,
                    numbers: [...new Set([...(prev?.numbers ?? []), ...input.numbers])],
                });
            }
        }

        return combined;
    },

};
