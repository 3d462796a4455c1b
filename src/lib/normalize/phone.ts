export const DEFAULT_COUNTRY_CODE = "+20";

/** Several numbers packed into one cell are joined by this token. */
export const MULTI_VALUE_DELIMITER = ":::";

export interface PhoneOptions {
    defaultCountryCode?: string;
}

interface DialingRule {
    pattern: RegExp;
    replacement: string;
}

// Tried in order; the first matching rule wins.
const DIALING_RULES: readonly DialingRule[] = [
    // Egyptian mobile dialed nationally: 010…, 011…, 012…, 015…
    { pattern: /^(01\d{8,})$/, replacement: "+2$1" },
    // Saudi mobile dialed nationally: 05… drops the trunk zero
    { pattern: /^0(5\d{8,})$/, replacement: "+966$1" },
    // Calling code already present, only the "+" missing
    { pattern: /^(201\d{9})$/, replacement: "+$1" },
    { pattern: /^(9665\d{8})$/, replacement: "+$1" },
    { pattern: /^(971\d{8,9})$/, replacement: "+$1" },
    { pattern: /^(90\d{10})$/, replacement: "+$1" },
    { pattern: /^(44\d{10})$/, replacement: "+$1" },
    { pattern: /^(7\d{10})$/, replacement: "+$1" },
];

function withPlus(code: string): string {
    return code.startsWith("+") ? code : `+${code}`;
}

/**
 * Canonicalizes a raw phone value into "+<calling code><number>".
 * Returns null for empty input, the literal "null", or values without digits.
 */
export function normalizePhone(raw: string | null | undefined, options: PhoneOptions = {}): string | null {
    if (raw == null) return null;
    const s = String(raw).trim();
    if (!s || s.toLowerCase() === "null") return null;

    const kept = s.replace(/[^\d+]/g, "");
    const digits = kept.replace(/\D/g, "");
    if (!digits) return null;

    if (kept.startsWith("+")) return `+${digits}`;
    if (digits.startsWith("00")) {
        const rest = digits.slice(2);
        return rest ? `+${rest}` : null;
    }

    for (const rule of DIALING_RULES) {
        if (rule.pattern.test(digits)) {
            return digits.replace(rule.pattern, rule.replacement);
        }
    }

    const national = digits.replace(/^0+/, "");
    if (!national) return null;
    return withPlus(options.defaultCountryCode ?? DEFAULT_COUNTRY_CODE) + national;
}

/**
 * Splits multi-number cells, normalizes every part and drops duplicates,
 * keeping the position of each number's first occurrence.
 */
export function expandAndNormalize(
    values: Iterable<string | null | undefined>,
    options: PhoneOptions = {}
): string[] {
    const out: string[] = [];
    const seen = new Set<string>();

    for (const value of values) {
        if (value == null) continue;
        for (const part of String(value).split(MULTI_VALUE_DELIMITER)) {
            const phone = normalizePhone(part, options);
            if (phone && !seen.has(phone)) {
                seen.add(phone);
                out.push(phone);
            }
        }
    }

    return out;
}
