import { describe, expect, it } from "vitest";

import { setAddBounded } from "./setAddBounded.js";

describe("setAddBounded", () => {
    it("evicts the oldest entries past the limit", () => {
        const set = new Set<string>();
        for (const value of ["a", "b", "c", "d"]) {
            setAddBounded(set, value, 3);
        }

        expect([...set]).toEqual(["b", "c", "d"]);
    });

    it("refreshes an existing entry instead of evicting it", () => {
        const set = new Set(["a", "b", "c"]);

        setAddBounded(set, "a", 3);
        setAddBounded(set, "d", 3);

        expect([...set]).toEqual(["c", "a", "d"]);
    });
});
