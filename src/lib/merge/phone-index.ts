/**
 * Reverse index: canonical phone → names of the records holding it.
 * Holder sets keep insertion order. Only ContactStore mutates an index.
 */
export class PhoneIndex {
    private readonly holders = new Map<string, Set<string>>();

    add(phone: string, name: string): void {
        let set = this.holders.get(phone);
        if (!set) {
            set = new Set();
            this.holders.set(phone, set);
        }
        set.add(name);
    }

    remove(phone: string, name: string): void {
        const set = this.holders.get(phone);
        if (!set) return;
        set.delete(name);
        if (set.size === 0) this.holders.delete(phone);
    }

    holdersOf(phone: string): string[] {
        return [...(this.holders.get(phone) ?? [])];
    }

    has(phone: string): boolean {
        return this.holders.has(phone);
    }

    /** Phones with more than one holder, in the order they were first indexed. */
    contested(): string[] {
        const out: string[] = [];
        for (const [phone, set] of this.holders) {
            if (set.size > 1) out.push(phone);
        }
        return out;
    }

    get size(): number {
        return this.holders.size;
    }
}
