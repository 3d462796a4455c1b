export const MARKER_TOKEN = "Lab";

// Whole-word "lab" in any case; letters of any script count as word characters.
const MARKER_WORD = /(?<![\p{L}\p{N}_])lab(?![\p{L}\p{N}_])/giu;
const MULTI_SPACE = /\s+/g;

function collapse(s: string): string {
    return s.replace(MULTI_SPACE, " ").trim();
}

export function stripMarkerToken(name: string | null | undefined): string {
    return collapse(String(name ?? "").replace(MARKER_WORD, ""));
}

/** Lower-cased, marker-free form of a display name used for identity matching. */
export function comparisonKeyOf(name: string): string {
    return stripMarkerToken(name).toLowerCase();
}

function endsWithMarker(s: string): boolean {
    const words = s.split(" ");
    return words[words.length - 1].toLowerCase() === MARKER_TOKEN.toLowerCase();
}

export function normalizeDisplayName(
    raw: string | null | undefined,
    appendMarker = true,
    preserveMarker = false
): string {
    if (!raw || !raw.trim()) return appendMarker ? MARKER_TOKEN : "";

    let s = preserveMarker ? raw : raw.replace(MARKER_WORD, "");
    s = collapse(s);

    if (appendMarker && !endsWithMarker(s)) {
        s = collapse(`${s} ${MARKER_TOKEN}`);
    }
    return s;
}
