import { describe, expect, it } from "vitest";
import { randomChoice, randomInt, seededRandom } from "@/lib/random";

describe("seededRandom", () => {
    it("replays the same sequence for the same seed", () => {
        const a = seededRandom(123);
        const b = seededRandom(123);
        const xs = Array.from({ length: 5 }, () => a());
        const ys = Array.from({ length: 5 }, () => b());
        expect(xs).toEqual(ys);
    });

    it("stays within [0, 1)", () => {
        const r = seededRandom(9);
        for (let i = 0; i < 200; i++) {
            const x = r();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(1);
        }
    });
});

describe("randomInt / randomChoice", () => {
    it("maps the unit interval onto inclusive bounds", () => {
        expect(randomInt(() => 0, 1, 3)).toBe(1);
        expect(randomInt(() => 0.5, 1, 3)).toBe(2);
        expect(randomInt(() => 0.99, 1, 3)).toBe(3);
    });

    it("refuses an empty list", () => {
        expect(() => randomChoice(() => 0, [])).toThrow("randomChoice: empty list");
    });
});
