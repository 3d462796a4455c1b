import { describe, it, expect } from "vitest";
import { exportColumns, projectAuditRow, projectRow, requiredColumns, summarize } from "../projection";
import { ContactRecord } from "../../../types/contact.types";
import { AuditEntry } from "../../../types/merge.types";

function record(overrides: Partial<ContactRecord>): ContactRecord {
    return {
        name: "",
        comparisonKey: "",
        numbers: new Set(),
        groups: new Set(),
        sources: new Set(),
        duplicates: new Set(),
        protected: false,
        firstName: "",
        lastName: "",
        snapshot: null,
        ...overrides,
    };
}

describe("exportColumns", () => {
    it("drops the combined name column and appends missing required columns", () => {
        const columns = exportColumns(["Name", "First Name", "Last Name", "Notes", "Phone 1 - Type", "Phone 1 - Value"], 2);

        expect(columns).toEqual([
            "First Name",
            "Last Name",
            "Notes",
            "Phone 1 - Type",
            "Phone 1 - Value",
            "Middle Name",
            "Group Membership",
            "Phone 2 - Type",
            "Phone 2 - Value",
            "Labels",
            "Custom Field 1 - Label",
            "Custom Field 1 - Value",
            "Custom Field 2 - Label",
            "Custom Field 2 - Value",
        ]);
    });

    it("is the required set for an empty template", () => {
        expect(exportColumns()).toEqual(requiredColumns());
        expect(requiredColumns()).toHaveLength(17);
    });
});

describe("projectRow", () => {
    it("projects a record created from the secondary source", () => {
        const row = projectRow(
            record({
                name: "Karim Lab",
                numbers: new Set(["+201033333333"]),
                groups: new Set(["🧪 Lab ::: * myContacts"]),
                sources: new Set(["Secondary"]),
            }),
            exportColumns()
        );

        expect(row).toEqual({
            "First Name": "Karim Lab",
            "Middle Name": "",
            "Last Name": "",
            "Group Membership": "",
            "Phone 1 - Type": "Mobile",
            "Phone 1 - Value": "+201033333333",
            "Phone 2 - Type": "",
            "Phone 2 - Value": "",
            "Phone 3 - Type": "",
            "Phone 3 - Value": "",
            "Phone 4 - Type": "",
            "Phone 4 - Value": "",
            "Labels": "🧪 Lab ::: * myContacts",
            "Custom Field 1 - Label": "Duplicate Names",
            "Custom Field 1 - Value": "",
            "Custom Field 2 - Label": "Sources",
            "Custom Field 2 - Value": "Secondary",
        });
    });

    it("keeps snapshot values and existing phones ahead of new ones", () => {
        const columns = exportColumns(["Name", "First Name", "Last Name", "Notes", "Phone 1 - Type", "Phone 1 - Value"]);
        const row = projectRow(
            record({
                name: "Jane Doe",
                numbers: new Set(["+201011111111", "+201022222222"]),
                groups: new Set(["* myContacts"]),
                sources: new Set(["Secondary", "Primary"]),
                duplicates: new Set(["Jane"]),
                snapshot: {
                    "Name": "Jane Doe",
                    "First Name": "Jane",
                    "Last Name": "Doe",
                    "Notes": "vip",
                    "Phone 1 - Type": "Work",
                    "Phone 1 - Value": "010 1111 1111",
                },
            }),
            columns
        );

        expect(row["Name"]).toBeUndefined();
        expect(row["First Name"]).toBe("Jane");
        expect(row["Notes"]).toBe("vip");
        expect(row["Phone 1 - Type"]).toBe("Work");
        expect(row["Phone 1 - Value"]).toBe("+201011111111");
        expect(row["Phone 2 - Type"]).toBe("Mobile");
        expect(row["Phone 2 - Value"]).toBe("+201022222222");
        expect(row["Phone 3 - Value"]).toBe("");
        expect(row["Labels"]).toBe("* myContacts");
        expect(row["Custom Field 1 - Value"]).toBe("Jane");
        expect(row["Custom Field 2 - Value"]).toBe("Primary & Secondary");
    });

    it("caps the phone slots and drops a bare calling code", () => {
        const row = projectRow(
            record({ name: "Omar", numbers: new Set(["+201011111111", "+20", "+201022222222"]) }),
            exportColumns([], 2),
            { maxPhoneSlots: 2 }
        );

        expect(row["Phone 1 - Value"]).toBe("+201011111111");
        expect(row["Phone 2 - Value"]).toBe("");
        expect(row["Phone 2 - Type"]).toBe("");
        expect(row["Labels"]).toBe("* myContacts");
    });
});

describe("projectAuditRow", () => {
    it("flattens an audit entry", () => {
        const entry: AuditEntry = {
            targetName: "Hany Lab",
            originalSnapshot: null,
            update: {
                secondaryName: "Hany Lab",
                secondaryOriginalName: "Hany",
                addedNumbers: ["+201055555555", "+201066666666"],
                addedFirstName: true,
                addedLastName: false,
            },
            finalState: {
                name: "Hany Lab",
                phones: ["+201044444444", "+201055555555", "+201066666666"],
                groups: "🧪 Lab ::: * myContacts",
                sources: "Primary & Secondary",
                duplicates: "Hany",
            },
        };

        expect(projectAuditRow(entry)).toEqual({
            "Primary Contact": "Hany Lab",
            "Secondary Name": "Hany Lab",
            "Secondary Original Name": "Hany",
            "Added Numbers": "+201055555555, +201066666666",
            "Added First Name": "true",
            "Added Last Name": "false",
            "Final Phone Numbers": "+201044444444, +201055555555, +201066666666",
            "Final Group Membership": "🧪 Lab ::: * myContacts",
            "Final Sources": "Primary & Secondary",
            "Final Duplicates": "Hany",
        });
    });
});

describe("summarize", () => {
    it("counts records by where they came from", () => {
        const merged = new Map<string, ContactRecord>([
            ["A", record({ name: "A", sources: new Set(["Primary"]), protected: true })],
            ["B", record({ name: "B", sources: new Set(["Primary", "Secondary"]) })],
            ["C", record({ name: "C", sources: new Set(["Secondary"]) })],
        ]);

        expect(summarize(merged, 4, 2)).toEqual({
            primary: 4,
            secondary: 2,
            total: 3,
            created: 1,
            merged: 1,
            protected: 1,
        });
    });
});
