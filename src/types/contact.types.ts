export type SourceTag = "Primary" | "Secondary";

/** Original column → value map of a primary-source row. */
export type FieldSnapshot = Record<string, string>;

export interface ContactRecord {
    name: string;
    comparisonKey: string;
    numbers: Set<string>;
    groups: Set<string>;
    sources: Set<SourceTag>;
    duplicates: Set<string>;
    protected: boolean;
    firstName: string;
    lastName: string;
    snapshot: FieldSnapshot | null;
}

export interface PrimaryInput {
    numbers: Iterable<string>;
    groups: Iterable<string>;
    // Derived from the groups when omitted.
    protected?: boolean;
    comparisonKey?: string;
    firstName: string;
    middleName: string;
    lastName: string;
    snapshot: FieldSnapshot | null;
}

export interface SecondaryInput {
    numbers: Iterable<string>;
    firstName: string;
    middleName: string;
    lastName: string;
    originalName: string;
    comparisonKey?: string;
}

/** Inputs are keyed by display name, in source order. */
export type PrimarySource = ReadonlyMap<string, PrimaryInput>;
export type SecondarySource = ReadonlyMap<string, SecondaryInput>;
