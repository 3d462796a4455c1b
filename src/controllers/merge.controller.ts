import { Request, Response, NextFunction, RequestHandler } from "express";
import { AppConfig } from "../config/app.config";
import { mergeFilesSchema, mergeSchema } from "../validators/merge.validator";
import { MergeRun, MergeService } from "../services/merge.service";
import { WrittenFiles } from "../repositories/output.repository";

function _body(run: MergeRun, files?: WrittenFiles) {
    return {
        summary: run.summary,
        stats: run.result.stats,
        contacts: run.rows,
        auditLog: run.result.auditLog,
        diagnostics: run.result.diagnostics,
        ...(files ? { files } : {}),
    };
}

export function mergeController(config: AppConfig): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const parsed = mergeSchema.safeParse(req.body);

        if (!parsed.success) {
            res.status(400).json({ error: parsed.error.errors[0].message });
            return;
        }

        try {
            const { persist, ...input } = parsed.data;
            const run = MergeService.fromText(input, config);
            const files = persist ? await MergeService.persist(run, config) : undefined;
            res.status(200).json(_body(run, files));
        } catch (err) {
            next(err);
        }
    };
}

export function exportController(config: AppConfig): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const parsed = mergeSchema.safeParse(req.body);

        if (!parsed.success) {
            res.status(400).json({ error: parsed.error.errors[0].message });
            return;
        }

        try {
            const run = MergeService.fromText(parsed.data, config);
            res.status(200)
                .type("text/csv")
                .attachment("merged_contacts.csv")
                .send(MergeService.toCsv(run));
        } catch (err) {
            next(err);
        }
    };
}

export function mergeFilesController(config: AppConfig): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const parsed = mergeFilesSchema.safeParse(req.body);

        if (!parsed.success) {
            res.status(400).json({ error: parsed.error.errors[0].message });
            return;
        }

        try {
            const { dryRun, ...input } = parsed.data;
            const run = await MergeService.fromFiles(input, config);
            const files = await MergeService.persist(run, config, dryRun);
            res.status(200).json(_body(run, files));
        } catch (err) {
            next(err);
        }
    };
}
