import { AppConfig } from "../config/app.config";
import { writeCsv } from "../lib/csv";
import { mergeContacts } from "../lib/merge/engine";
import { exportColumns, projectRow, summarize } from "../lib/merge/projection";
import { OutputRepository, runTimestamp, WrittenFiles } from "../repositories/output.repository";
import { LoadedPrimary, PrimarySourceRepository } from "../repositories/primary-source.repository";
import { SecondaryRow, SecondarySourceRepository } from "../repositories/secondary-source.repository";
import { SourceFileRepository } from "../repositories/source-file.repository";
import { SourceReadError } from "../errors/source-read.error";
import { SecondarySource } from "../types/contact.types";
import { MergeResult, MergeSummary } from "../types/merge.types";

export interface MergeRun {
    result: MergeResult;
    summary: MergeSummary;
    columns: string[];
    rows: Record<string, string>[];
}

export interface TextMergeInput {
    primaryCsv: string;
    secondaryCsvs: string[];
    secondaryRows: SecondaryRow[];
    enrichProtected?: boolean;
}

export interface FileMergeInput {
    primaryPath: string;
    secondaryPaths: string[];
    enrichProtected?: boolean;
}

export const MergeService = {

    /** Loads posted CSV text / JSON rows and merges them. */
    fromText(input: TextMergeInput, config: AppConfig): MergeRun {
        const phoneOptions = { defaultCountryCode: config.defaultCountryCode };

        const primary = PrimarySourceRepository.fromCsv(input.primaryCsv, phoneOptions);
        if (!primary.contacts.size) {
            throw new SourceReadError("Primary source has no named contacts");
        }

        const batches: SecondarySource[] = input.secondaryCsvs.map((csv) =>
            SecondarySourceRepository.fromCsv(csv, phoneOptions)
        );
        if (input.secondaryRows.length) {
            batches.push(SecondarySourceRepository.fromRows(input.secondaryRows, phoneOptions));
        }

        return MergeService.run(primary, batches, config, input.enrichProtected);
    },

    /**
     * Reads the sources from disk under the configured input directory.
     * An unreadable secondary file is skipped with a warning; the primary
     * file is required.
     */
    async fromFiles(input: FileMergeInput, config: AppConfig): Promise<MergeRun> {
        const phoneOptions = { defaultCountryCode: config.defaultCountryCode };

        console.log(`[LOADER] Reading primary source '${input.primaryPath}'`);
        const primaryText = await SourceFileRepository.readText(config.inputDir, input.primaryPath);
        const primary = PrimarySourceRepository.fromCsv(primaryText, phoneOptions);
        if (!primary.contacts.size) {
            throw new SourceReadError(`Primary source '${input.primaryPath}' has no named contacts`, input.primaryPath);
        }
        console.log(`[LOADER] Loaded ${primary.contacts.size} primary contacts.`);

        const batches: SecondarySource[] = [];
        for (const p of input.secondaryPaths) {
            try {
                const text = await SourceFileRepository.readText(config.inputDir, p);
                const batch = SecondarySourceRepository.fromCsv(text, phoneOptions);
                console.log(`[LOADER] Loaded ${batch.size} secondary contacts from '${p}'.`);
                batches.push(batch);
            } catch (err) {
                if (!(err instanceof SourceReadError)) throw err;
                console.warn(`[LOADER] Skipping '${p}': ${err.message}`);
            }
        }

        return MergeService.run(primary, batches, config, input.enrichProtected);
    },

    run(
        primary: LoadedPrimary,
        batches: SecondarySource[],
        config: AppConfig,
        enrichProtected = config.enrichProtected
    ): MergeRun {
        const secondary = SecondarySourceRepository.combine(batches);

        console.log(
            `[MERGE] Starting merge: ${primary.contacts.size} primary, ${secondary.size} secondary contacts.`
        );
        const result = mergeContacts(primary.contacts, secondary, {
            defaultCountryCode: config.defaultCountryCode,
            enrichProtected,
        });
        _logPasses(result);

        const columns = exportColumns(primary.columns, config.maxPhoneSlots);
        const projection = { maxPhoneSlots: config.maxPhoneSlots, defaultCountryCode: config.defaultCountryCode };
        const rows = [...result.merged.values()].map((record) => projectRow(record, columns, projection));

        return {
            result,
            summary: summarize(result.merged, primary.contacts.size, secondary.size),
            columns,
            rows,
        };
    },

    toCsv(run: MergeRun): string {
        return writeCsv(run.columns, run.rows);
    },

    /** Writes the merged file (unless `dryRun`) and the audit files. */
    async persist(run: MergeRun, config: AppConfig, dryRun = false): Promise<WrittenFiles> {
        const files = await OutputRepository.writeRun(config.outputDir, runTimestamp(), {
            contactsCsv: dryRun ? undefined : MergeService.toCsv(run),
            auditLog: run.result.auditLog,
            summary: run.summary,
        });
        for (const file of Object.values(files)) {
            console.log(`[OUTPUT] Wrote '${file}'`);
        }
        return files;
    },

};

// ── Private Helpers ──────────────────────────────────────────────────────────

function _logPasses({ stats, diagnostics }: MergeResult): void {
    console.log(`[MERGE] After primary seed: ${stats.afterSeed} entries.`);
    console.log(`[MERGE] After name-based merging: ${stats.afterNameConsolidation} entries.`);
    console.log(`[MERGE] After phone-based merging: ${stats.afterPhoneConsolidation} entries.`);
    console.log(`[MERGE] After secondary integration: ${stats.afterSecondaryIntegration} entries.`);
    console.log(`[MERGE] Final merged contact count: ${stats.final} (${stats.absorptions} absorbed).`);

    for (const d of diagnostics) {
        if (d.kind === "protected-target-skipped") {
            console.warn(
                `[MERGE] '${d.secondaryName}' matches protected '${d.targetName}'; not applied: ${
                    d.droppedNumbers.join(", ") || "(no new numbers)"
                }`
            );
        }
    }
}
