import { describe, it, expect } from "vitest";
import { expandAndNormalize, normalizePhone } from "../phone";

describe("normalizePhone", () => {
    it("maps national Egyptian mobiles to +2", () => {
        expect(normalizePhone("0101234567")).toBe("+20101234567");
        expect(normalizePhone("010 1111 1111")).toBe("+201011111111");
    });

    it("maps national Saudi mobiles to +966 without the trunk zero", () => {
        expect(normalizePhone("0512345678")).toBe("+966512345678");
    });

    it("turns a leading 00 into +", () => {
        expect(normalizePhone("00201234567")).toBe("+201234567");
    });

    it("keeps numbers that already carry a +", () => {
        expect(normalizePhone("+20 (10) 123-4567")).toBe("+20101234567");
        expect(normalizePhone("+44 7911 123456")).toBe("+447911123456");
    });

    it("adds + to numbers that start with a known calling code", () => {
        expect(normalizePhone("201001234567")).toBe("+201001234567");
        expect(normalizePhone("966512345678")).toBe("+966512345678");
        expect(normalizePhone("971501234567")).toBe("+971501234567");
        expect(normalizePhone("905321234567")).toBe("+905321234567");
        expect(normalizePhone("447911123456")).toBe("+447911123456");
        expect(normalizePhone("79161234567")).toBe("+79161234567");
    });

    it("falls back to the default country code", () => {
        expect(normalizePhone("2345678")).toBe("+202345678");
        expect(normalizePhone("0 2345678")).toBe("+202345678");
        expect(normalizePhone("2345678", { defaultCountryCode: "966" })).toBe("+9662345678");
    });

    it("returns null for empty or placeholder values", () => {
        expect(normalizePhone("")).toBeNull();
        expect(normalizePhone("   ")).toBeNull();
        expect(normalizePhone("NULL")).toBeNull();
        expect(normalizePhone("null")).toBeNull();
        expect(normalizePhone("n/a")).toBeNull();
        expect(normalizePhone("0")).toBeNull();
        expect(normalizePhone("+")).toBeNull();
        expect(normalizePhone(undefined)).toBeNull();
    });

    it("is a fixed point on its own output", () => {
        const samples = ["0101234567", "00201234567", "0512345678", "2345678", "971501234567", "+1 (555) 010-0000"];
        for (const s of samples) {
            const once = normalizePhone(s);
            expect(normalizePhone(once)).toBe(once);
        }
    });
});

describe("expandAndNormalize", () => {
    it("splits packed cells and keeps first occurrences in order", () => {
        const out = expandAndNormalize(["0101234567:::+20101234567", null, "0512345678", "0101234567"]);
        expect(out).toEqual(["+20101234567", "+966512345678"]);
    });

    it("drops values that do not normalize", () => {
        expect(expandAndNormalize(["NULL", "", " ::: "])).toEqual([]);
    });

    it("passes the country code through", () => {
        expect(expandAndNormalize(["2345678"], { defaultCountryCode: "+971" })).toEqual(["+9712345678"]);
    });
});
