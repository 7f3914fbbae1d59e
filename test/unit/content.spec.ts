import { absolute, relative } from "../../src/image/Address.js";
import { Arena } from "../../src/image/Arena.js";
import { Binary } from "../../src/image/Binary.js";
import { InternalError } from "../../src/utils/InternalError.js";

interface Layout {
    arena: Arena;
    binaries: Binary[];
}

// region R at 0x100 with S1 = [3 bytes, word] and S2 = [2 bytes]
function buildLayout(): Layout {
    const arena = new Arena("IMG");
    const region = arena.newRegion("R");

    const s1 = arena.newSection("S1", false);
    region.append(s1);
    const b1 = arena.newBinary(1, 3);
    const b2 = arena.newBinary(4, 4);
    s1.append(b1);
    s1.append(b2);
    s1.assign(b1);
    s1.assign(b2);

    const s2 = arena.newSection("S2", false);
    region.append(s2);
    const b3 = arena.newBinary(1, 2);
    s2.append(b3);
    s2.assign(b3);

    region.position(0x100);
    region.assignAll();
    region.bindAll();
    arena.image.locateAll();

    b1.build(Uint8Array.from([1, 2, 3]));
    b2.build(Uint8Array.from([4, 5, 6, 7]));
    b3.build(Uint8Array.from([8, 9]));
    return { arena, binaries: [b1, b2, b3] };
}

describe("GIVEN a region with two control sections", () => {
    describe("WHEN allocating and binding", () => {
        const { arena, binaries } = buildLayout();
        const [s1, s2] = arena.allSections();

        test("THEN contents should be aligned inside their section", () => {
            expect(s1.length).toEqual(8);
            expect(binaries[1].loc).toEqual(absolute(0x104));
        });

        test("THEN sections should be aligned to doublewords in the region", () => {
            expect(s1.loc).toEqual(absolute(0x100));
            expect(s2.loc).toEqual(absolute(0x108));
            expect(arena.region(0).length).toEqual(10);
        });

        test("THEN addresses should increase in placement order", () => {
            const addrs = binaries.map(b => b.loc?.kind == "absolute" ? b.loc.value : -1);
            expect(addrs).toEqual([0x100, 0x104, 0x108]);
        });

        test("THEN image offsets should be set", () => {
            expect(arena.region(0).imageOffset).toEqual(0);
            expect(s2.imageOffset).toEqual(8);
        });

        test("THEN absolute addresses should never become relative again", () => {
            expect(() => binaries[0].setLocation(relative(0, 0, false))).toThrow(InternalError);
        });

        test("THEN lengths should be fixed once positioned", () => {
            expect(() => binaries[0].setLength(5)).toThrow(InternalError);
        });
    });

    describe("WHEN inserting the bytes", () => {
        const first = buildLayout().arena.image.insert();
        const second = buildLayout().arena.image.insert();

        test("THEN every binary should land at its offset", () => {
            expect([...first]).toEqual([1, 2, 3, 0, 4, 5, 6, 7, 8, 9]);
        });

        test("THEN the result should be deterministic", () => {
            expect(second).toEqual(first);
        });
    });

    describe("WHEN misusing containers", () => {
        test("THEN appending a child twice should fail", () => {
            const arena = new Arena("IMG");
            const s1 = arena.newSection("A", false);
            const s2 = arena.newSection("B", false);
            const b = arena.newBinary(1, 1);
            s1.append(b);
            expect(() => s2.append(b)).toThrow(InternalError);
        });

        test("THEN appending to a frozen section should fail", () => {
            const arena = new Arena("IMG");
            const s = arena.newSection("A", false);
            s.freeze();
            expect(() => s.append(arena.newBinary(1, 1))).toThrow(InternalError);
        });

        test("THEN binding a dummy section should fail", () => {
            const arena = new Arena("IMG");
            const s = arena.newSection("D", true);
            expect(() => s.makeAbsolute()).toThrow(InternalError);
        });

        test("THEN building with the wrong size should fail", () => {
            const arena = new Arena("IMG");
            const s = arena.newSection("A", false);
            const b = arena.newBinary(1, 2);
            s.append(b);
            s.assign(b);
            expect(() => b.build(new Uint8Array(3))).toThrow(InternalError);
        });
    });

    describe("WHEN moving the cursor with ORG", () => {
        const arena = new Arena("IMG");
        const s = arena.newSection("A", false);
        const b1 = arena.newBinary(1, 8);
        const b2 = arena.newBinary(1, 2);
        const b3 = arena.newBinary(1, 1);
        s.append(b1);
        s.append(b2);
        s.append(b3);
        s.assign(b1);
        s.org(2);
        s.assign(b2);
        s.orgHighWater();
        s.assign(b3);

        test("THEN going back should not shrink the section", () => {
            expect(b2.loc).toEqual(relative(0, 2, false));
        });

        test("THEN returning to the high-water mark should continue behind everything", () => {
            expect(b3.loc).toEqual(relative(0, 8, false));
            expect(s.length).toEqual(9);
        });
    });
});
