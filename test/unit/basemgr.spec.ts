import { BaseMgr, BaseResolution, NoBaseAvailableError } from "../../src/assembler/BaseMgr.js";
import { absolute, relative } from "../../src/image/Address.js";
import { Targets } from "../../src/isa/Targets.js";

// deterministic pseudo random numbers for the exhaustive comparison
function makeRandom(seed: number): (limit: number) => number {
    let state = seed;
    return limit => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state % limit;
    };
}

describe("GIVEN a base register manager for S/370", () => {
    describe("WHEN two registers cover the same anchor", () => {
        const mgr = new BaseMgr(Targets["s370"].directRegisters);
        mgr.assign(5, absolute(0x1000));
        mgr.assign(9, absolute(0x1000));

        test("THEN the highest register should win", () => {
            expect(mgr.resolve(absolute(0x1004), 12)).toEqual({ register: 9, displacement: 4 });
        });

        test("THEN dropping it should fall back to the other one", () => {
            mgr.drop(9);
            mgr.drop(9);
            expect(mgr.resolve(absolute(0x1004), 12)).toEqual({ register: 5, displacement: 4 });
        });
    });

    describe("WHEN registers have different anchors", () => {
        const mgr = new BaseMgr(Targets["s370"].directRegisters);
        mgr.assign(3, absolute(0x1000));
        mgr.assign(4, absolute(0x1800));

        test("THEN the smallest displacement should win", () => {
            expect(mgr.resolve(absolute(0x1900), 12)).toEqual({ register: 4, displacement: 0x100 });
        });

        test("THEN anchors behind the target should not be used", () => {
            expect(mgr.resolve(absolute(0x1700), 12)).toEqual({ register: 3, displacement: 0x700 });
        });

        test("THEN the direct register 0 should cover low storage", () => {
            expect(mgr.resolve(absolute(0x80), 12)).toEqual({ register: 0, displacement: 0x80 });
        });

        test("THEN targets out of reach should fail", () => {
            expect(() => mgr.resolve(absolute(0x3000), 12)).toThrow(NoBaseAvailableError);
        });
    });

    describe("WHEN an assigned register ties with a direct one", () => {
        const mgr = new BaseMgr(Targets["s370"].directRegisters);
        mgr.assign(7, absolute(0));

        test("THEN the assigned register should win", () => {
            expect(mgr.resolve(absolute(0x10), 12)).toEqual({ register: 7, displacement: 0x10 });
        });
    });

    describe("WHEN register 0 is assigned explicitly", () => {
        const mgr = new BaseMgr(Targets["s370"].directRegisters);
        mgr.assign(0, absolute(0x2000));

        test("THEN the assignment should shadow the direct anchor", () => {
            expect(() => mgr.resolve(absolute(0x10), 12)).toThrow(NoBaseAvailableError);
        });

        test("THEN DROP should bring the direct anchor back", () => {
            mgr.dropAll();
            expect(mgr.resolve(absolute(0x10), 12)).toEqual({ register: 0, displacement: 0x10 });
        });
    });

    describe("WHEN anchors are section offsets", () => {
        const mgr = new BaseMgr(Targets["s370"].directRegisters);
        mgr.assign(4, relative(2, 0x10, false));

        test("THEN targets in the same section should resolve", () => {
            expect(mgr.resolve(relative(2, 0x30, false), 12)).toEqual({ register: 4, displacement: 0x20 });
        });

        test("THEN targets in other sections should fail", () => {
            expect(() => mgr.resolve(relative(3, 0x30, false), 12)).toThrow(NoBaseAvailableError);
        });
    });

    describe("WHEN given invalid registers", () => {
        const mgr = new BaseMgr([]);

        test("THEN they should be rejected", () => {
            expect(() => mgr.assign(16, absolute(0))).toThrow("Invalid register 16");
            expect(() => mgr.drop(-1)).toThrow("Invalid register -1");
        });
    });
});

describe("GIVEN a base register manager for the model 20", () => {
    const mgr = new BaseMgr(Targets["s360-20"].directRegisters);

    test("THEN every 4K page should have its own direct register", () => {
        expect(mgr.resolve(absolute(0x3456), 12)).toEqual({ register: 3, displacement: 0x456 });
    });

    test("THEN direct registers with the same anchor should prefer the lowest", () => {
        const tied = new BaseMgr([{ register: 3, anchor: 0 }, { register: 2, anchor: 0 }]);
        expect(tied.resolve(absolute(8), 12)).toEqual({ register: 2, displacement: 8 });
    });
});

describe("GIVEN random register assignments", () => {
    const random = makeRandom(0x360);

    // straightforward search over all registers
    function expected(usings: Map<number, number>, target: number): BaseResolution | undefined {
        let best: BaseResolution | undefined;
        let bestDirect = false;
        for (let reg = 0; reg < BaseMgr.NumRegisters; reg++) {
            const assigned = usings.get(reg);
            const direct = assigned === undefined && reg == 0;
            const anchor = assigned ?? (direct ? 0 : undefined);
            if (anchor === undefined || target < anchor || target - anchor >= 4096) {
                continue;
            }

            const disp = target - anchor;
            const better = !best || disp < best.displacement ||
                (disp == best.displacement && bestDirect && !direct) ||
                (disp == best.displacement && !bestDirect && !direct);
            if (better) {
                best = { register: reg, displacement: disp };
                bestDirect = direct;
            }
        }
        return best;
    }

    test("THEN resolution should match a search over all registers", () => {
        for (let round = 0; round < 200; round++) {
            const mgr = new BaseMgr(Targets["s370"].directRegisters);
            const usings = new Map<number, number>();
            const count = random(6);
            for (let i = 0; i < count; i++) {
                const reg = random(16);
                const anchor = random(8) * 0x400;
                mgr.assign(reg, absolute(anchor));
                usings.set(reg, anchor);
            }

            for (let lookup = 0; lookup < 20; lookup++) {
                const target = random(0x3000);
                const want = expected(usings, target);
                if (want) {
                    expect(mgr.resolve(absolute(target), 12)).toEqual(want);
                } else {
                    expect(() => mgr.resolve(absolute(target), 12)).toThrow(NoBaseAvailableError);
                }
            }
        }
    });
});
