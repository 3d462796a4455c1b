import {
    ContactRecord,
    PrimarySource,
    SecondarySource,
    SourceTag,
} from "../../types/contact.types";
import {
    AuditEntry,
    AuditFinalState,
    MergeDiagnostic,
    MergeOptions,
    MergeResult,
    MergeStats,
} from "../../types/merge.types";
import { DEFAULT_NEW_GROUP, isMarkerGroup, normalizeGroupLabel } from "../normalize/groups";
import { comparisonKeyOf } from "../normalize/names";
import { expandAndNormalize, PhoneOptions } from "../normalize/phone";
import { ContactStore } from "./contact-store";

const PRIMARY: SourceTag = "Primary";
const SECONDARY: SourceTag = "Secondary";

/**
 * Reconciles the primary and secondary sources into one deduplicated set.
 *
 * Runs five passes in order: seed from primary, collapse equal comparison
 * keys, collapse shared phones, integrate the secondary source, collapse
 * shared phones again. Synchronous; each call owns its working set.
 */
export function mergeContacts(
    primary: PrimarySource,
    secondary: SecondarySource,
    options: MergeOptions = {}
): MergeResult {
    const phoneOptions: PhoneOptions = { defaultCountryCode: options.defaultCountryCode };
    const store = new ContactStore();
    const auditLog: AuditEntry[] = [];
    const diagnostics: MergeDiagnostic[] = [];

    // ── PASS 1: seed from primary ───────────────────────────────────────────
    const primaryKeys = new Map<string, string>();

    for (const [name, input] of primary) {
        const rawGroups = [...input.groups];
        const key = (input.comparisonKey || comparisonKeyOf(name)).toLowerCase();
        if (key && !primaryKeys.has(key)) primaryKeys.set(key, name);

        store.insert({
            name,
            comparisonKey: key,
            numbers: expandAndNormalize(input.numbers, phoneOptions),
            groups: rawGroups.map(normalizeGroupLabel).filter(Boolean),
            sources: [PRIMARY],
            protected: input.protected ?? !rawGroups.some(isMarkerGroup),
            firstName: input.firstName,
            lastName: input.lastName,
            snapshot: input.snapshot,
        });
    }
    const afterSeed = store.size;

    // ── PASS 2: collapse records sharing a comparison key ───────────────────
    const byKey = new Map<string, string[]>();
    for (const record of store.values()) {
        const members = byKey.get(record.comparisonKey) ?? [];
        members.push(record.name);
        byKey.set(record.comparisonKey, members);
    }
    for (const members of byKey.values()) {
        if (members.length > 1) collapseInto(store, members);
    }
    const afterNameConsolidation = store.size;

    // ── PASS 3: collapse records sharing a phone ────────────────────────────
    consolidateByPhone(store);
    const afterPhoneConsolidation = store.size;

    // ── PASS 4: integrate the secondary source ──────────────────────────────
    let secondaryRecords = 0;

    for (const [name, input] of secondary) {
        const numbers = expandAndNormalize(input.numbers, phoneOptions);
        if (!numbers.length) {
            diagnostics.push({ kind: "secondary-without-numbers", secondaryName: name });
            continue;
        }
        secondaryRecords++;

        const key = input.comparisonKey || comparisonKeyOf(name);
        const target = findTarget(store, name, numbers, key, primaryKeys);

        if (target) {
            const existing = store.get(target);
            if (!existing) continue;

            if (existing.protected && !options.enrichProtected) {
                diagnostics.push({
                    kind: "protected-target-skipped",
                    secondaryName: name,
                    targetName: target,
                    droppedNumbers: numbers.filter((n) => !existing.numbers.has(n)).sort(),
                });
                continue;
            }

            const originalSnapshot = existing.snapshot ? { ...existing.snapshot } : null;
            const addedNumbers = store.addNumbers(target, numbers).sort();
            existing.sources.add(SECONDARY);

            let addedFirstName = false;
            let addedLastName = false;
            if (!existing.protected) {
                if (!existing.firstName && input.firstName) {
                    existing.firstName = input.firstName;
                    addedFirstName = true;
                }
                if (!existing.lastName && input.lastName) {
                    existing.lastName = input.lastName;
                    addedLastName = true;
                }
            }
            existing.duplicates.add(input.originalName || name);

            auditLog.push({
                targetName: target,
                originalSnapshot,
                update: {
                    secondaryName: name,
                    secondaryOriginalName: input.originalName,
                    addedNumbers,
                    addedFirstName,
                    addedLastName,
                },
                finalState: finalStateOf(existing),
            });
            continue;
        }

        store.insert({
            name,
            comparisonKey: key,
            numbers,
            groups: [options.defaultGroup ?? DEFAULT_NEW_GROUP],
            sources: [SECONDARY],
            protected: false,
            firstName: input.firstName,
            lastName: input.lastName,
        });
        const created = store.get(name);
        if (!created) continue;

        const folded = name.trim().toLowerCase();
        for (const other of store.names()) {
            if (other !== name && other.trim().toLowerCase() === folded) {
                created.duplicates.add(other);
            }
        }
    }
    const afterSecondaryIntegration = store.size;

    // ── PASS 5: collapse shared phones across the enlarged set ──────────────
    consolidateByPhone(store);

    const stats: MergeStats = {
        primaryRecords: primary.size,
        secondaryRecords,
        afterSeed,
        afterNameConsolidation,
        afterPhoneConsolidation,
        afterSecondaryIntegration,
        final: store.size,
        absorptions: store.absorptions,
    };

    return { merged: store.release(), auditLog, diagnostics, stats };
}

/**
 * First unprotected candidate wins; when every candidate is protected the
 * first one does. Candidates are expected in working-set order.
 */
export function pickCanonical(store: ContactStore, candidates: string[]): string | undefined {
    return candidates.find((name) => store.get(name)?.protected === false) ?? candidates[0];
}

function collapseInto(store: ContactStore, names: string[]): void {
    const candidates = store.inOrder(names);
    const canonical = pickCanonical(store, candidates);
    if (canonical === undefined) return;

    for (const name of candidates) {
        if (name !== canonical) store.absorb(name, canonical);
    }
}

function consolidateByPhone(store: ContactStore): void {
    for (const phone of store.contestedPhones()) {
        const holders = store.holdersOf(phone);
        if (holders.length > 1) collapseInto(store, holders);
    }
}

function findTarget(
    store: ContactStore,
    name: string,
    numbers: string[],
    key: string,
    primaryKeys: ReadonlyMap<string, string>
): string | undefined {
    for (const phone of numbers) {
        const holders = store.holdersOf(phone);
        if (holders.length) return holders[0];
    }

    const byKey = primaryKeys.get(key.toLowerCase());
    const resolved = byKey === undefined ? undefined : store.resolve(byKey);
    if (resolved !== undefined) return resolved;

    // A record already holding this exact display name is the same contact.
    return store.has(name) ? name : undefined;
}

export function finalStateOf(record: ContactRecord): AuditFinalState {
    return {
        name: record.name,
        phones: [...record.numbers].sort(),
        groups: [...record.groups].sort().join(" ::: "),
        sources: [...record.sources].sort().join(" & "),
        duplicates: [...record.duplicates].sort().join(" - "),
    };
}
