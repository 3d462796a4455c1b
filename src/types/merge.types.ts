import { ContactRecord, FieldSnapshot } from "./contact.types";

export interface MergeOptions {
    defaultCountryCode?: string;
    defaultGroup?: string;
    // Apply secondary numbers to protected records too (name parts stay untouched).
    enrichProtected?: boolean;
}

export interface AuditUpdate {
    secondaryName: string;
    secondaryOriginalName: string;
    addedNumbers: string[];
    addedFirstName: boolean;
    addedLastName: boolean;
}

export interface AuditFinalState {
    name: string;
    phones: string[];
    groups: string;
    sources: string;
    duplicates: string;
}

export interface AuditEntry {
    targetName: string;
    originalSnapshot: FieldSnapshot | null;
    update: AuditUpdate;
    finalState: AuditFinalState;
}

export type MergeDiagnostic =
    | {
          kind: "protected-target-skipped";
          secondaryName: string;
          targetName: string;
          droppedNumbers: string[];
      }
    | {
          kind: "secondary-without-numbers";
          secondaryName: string;
      };

export interface MergeStats {
    primaryRecords: number;
    secondaryRecords: number;
    afterSeed: number;
    afterNameConsolidation: number;
    afterPhoneConsolidation: number;
    afterSecondaryIntegration: number;
    final: number;
    absorptions: number;
}

export interface MergeResult {
    merged: Map<string, ContactRecord>;
    auditLog: AuditEntry[];
    diagnostics: MergeDiagnostic[];
    stats: MergeStats;
}

export interface MergeSummary {
    primary: number;
    secondary: number;
    total: number;
    created: number;
    merged: number;
    protected: number;
}
