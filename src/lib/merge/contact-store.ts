import { ContactRecord, FieldSnapshot, SourceTag } from "../../types/contact.types";
import { PhoneIndex } from "./phone-index";

export interface NewRecord {
    name: string;
    comparisonKey: string;
    numbers?: Iterable<string>;
    groups?: Iterable<string>;
    sources?: Iterable<SourceTag>;
    protected?: boolean;
    firstName?: string;
    lastName?: string;
    snapshot?: FieldSnapshot | null;
}

/**
 * The working set of one merge run: display name → record, plus the phone
 * index kept in step with it. Every number change goes through insert,
 * addNumbers or absorb.
 */
export class ContactStore {
    private readonly records = new Map<string, ContactRecord>();
    private readonly index = new PhoneIndex();
    // Insertion sequence; the tie-break between candidates for canonical record.
    private readonly rank = new Map<string, number>();
    private readonly absorbedInto = new Map<string, string>();
    private nextRank = 0;
    private absorbCount = 0;

    /** Adds a record; returns false and changes nothing if the name is taken. */
    insert(input: NewRecord): boolean {
        if (this.records.has(input.name)) return false;

        const record: ContactRecord = {
            name: input.name,
            comparisonKey: input.comparisonKey,
            numbers: new Set(),
            groups: new Set(input.groups ?? []),
            sources: new Set(input.sources ?? []),
            duplicates: new Set(),
            protected: input.protected ?? false,
            firstName: input.firstName ?? "",
            lastName: input.lastName ?? "",
            snapshot: input.snapshot ? { ...input.snapshot } : null,
        };
        this.records.set(record.name, record);
        this.rank.set(record.name, this.nextRank++);
        this.addNumbers(record.name, input.numbers ?? []);
        return true;
    }

    /** Returns the numbers the record did not hold before. */
    addNumbers(name: string, numbers: Iterable<string>): string[] {
        const record = this.records.get(name);
        if (!record) return [];

        const added: string[] = [];
        for (const phone of numbers) {
            if (record.numbers.has(phone)) continue;
            record.numbers.add(phone);
            this.index.add(phone, name);
            added.push(phone);
        }
        return added;
    }

    /**
     * Folds `source` into `destination` and deletes `source`.
     * No-op when the names are equal or either record is gone.
     */
    absorb(source: string, destination: string): boolean {
        if (source === destination) return false;
        const src = this.records.get(source);
        const dst = this.records.get(destination);
        if (!src || !dst) return false;

        for (const phone of src.numbers) {
            dst.numbers.add(phone);
            this.index.add(phone, destination);
            this.index.remove(phone, source);
        }
        for (const group of src.groups) dst.groups.add(group);
        for (const tag of src.sources) dst.sources.add(tag);
        for (const dup of src.duplicates) dst.duplicates.add(dup);
        dst.duplicates.add(source);

        if (!dst.snapshot && src.snapshot) dst.snapshot = { ...src.snapshot };
        dst.protected = dst.protected || src.protected;

        this.records.delete(source);
        this.rank.delete(source);
        this.absorbedInto.set(source, destination);
        this.absorbCount++;
        return true;
    }

    get(name: string): ContactRecord | undefined {
        return this.records.get(name);
    }

    has(name: string): boolean {
        return this.records.has(name);
    }

    /** Follows absorptions to the record that now carries `name`, if any. */
    resolve(name: string): string | undefined {
        let current: string | undefined = name;
        const visited = new Set<string>();
        while (current !== undefined && !this.records.has(current)) {
            if (visited.has(current)) return undefined;
            visited.add(current);
            current = this.absorbedInto.get(current);
        }
        return current;
    }

    holdersOf(phone: string): string[] {
        return this.inOrder(this.index.holdersOf(phone));
    }

    contestedPhones(): string[] {
        return this.index.contested();
    }

    /** Keeps the names still present, sorted by when they entered the set. */
    inOrder(names: Iterable<string>): string[] {
        const present: string[] = [];
        for (const name of names) {
            if (this.records.has(name)) present.push(name);
        }
        return present.sort((a, b) => (this.rank.get(a) ?? 0) - (this.rank.get(b) ?? 0));
    }

    names(): string[] {
        return [...this.records.keys()];
    }

    values(): ContactRecord[] {
        return [...this.records.values()];
    }

    get size(): number {
        return this.records.size;
    }

    get absorptions(): number {
        return this.absorbCount;
    }

    get phoneCount(): number {
        return this.index.size;
    }

    /** The working set itself; the store must not be used afterwards. */
    release(): Map<string, ContactRecord> {
        return this.records;
    }
}
