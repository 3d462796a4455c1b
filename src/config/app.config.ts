import "dotenv/config";
import path from "path";
import { z } from "zod";

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    DEFAULT_COUNTRY_CODE: z
        .string()
        .regex(/^\+?\d{1,4}$/, "DEFAULT_COUNTRY_CODE must be a calling code such as +20")
        .default("+20"),
    OUTPUT_DIR: z.string().min(1).default("output"),
    INPUT_DIR: z.string().min(1).default("."),
    MAX_PHONE_SLOTS: z.coerce.number().int().min(1).max(9).default(4),
    BODY_LIMIT: z.string().default("25mb"),
    ENRICH_PROTECTED: z
        .enum(["true", "false"])
        .default("false")
        .transform((v) => v === "true"),
});

export interface AppConfig {
    port: number;
    defaultCountryCode: string;
    outputDir: string;
    inputDir: string;
    maxPhoneSlots: number;
    bodyLimit: string;
    enrichProtected: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid configuration: ${parsed.error.errors[0].message}`);
    }

    const e = parsed.data;
    return {
        port: e.PORT,
        defaultCountryCode: e.DEFAULT_COUNTRY_CODE.startsWith("+")
            ? e.DEFAULT_COUNTRY_CODE
            : `+${e.DEFAULT_COUNTRY_CODE}`,
        outputDir: path.resolve(e.OUTPUT_DIR),
        inputDir: path.resolve(e.INPUT_DIR),
        maxPhoneSlots: e.MAX_PHONE_SLOTS,
        bodyLimit: e.BODY_LIMIT,
        enrichProtected: e.ENRICH_PROTECTED,
    };
}
