import { readFile } from "fs/promises";
import path from "path";
import { SourceReadError } from "../errors/source-read.error";
import { decodeText } from "../lib/csv";

export const SourceFileRepository = {

    /** Resolves `relativePath` under `root`; paths escaping it are rejected. */
    resolve(root: string, relativePath: string): string {
        const base = path.resolve(root);
        const full = path.resolve(base, relativePath);
        const rel = path.relative(base, full);
        if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
            throw new SourceReadError(`Path is outside the input directory: ${relativePath}`, relativePath);
        }
        return full;
    },

    async readText(root: string, relativePath: string): Promise<string> {
        const full = SourceFileRepository.resolve(root, relativePath);
        try {
            return decodeText(await readFile(full));
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new SourceReadError(`Cannot read ${relativePath}: ${reason}`, relativePath);
        }
    },

};
