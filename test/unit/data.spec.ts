import { toBigEndian } from "../../src/assembler/assemblers/DataAssembler.js";

describe("GIVEN big-endian encoding of constants", () => {
    test("THEN positive values should be stored most significant byte first", () => {
        expect([...toBigEndian(258n, 2)]).toEqual([1, 2]);
    });

    test("THEN negative values should use two's complement", () => {
        expect([...toBigEndian(-1n, 4)]).toEqual([0xFF, 0xFF, 0xFF, 0xFF]);
        expect([...toBigEndian(-128n, 1)]).toEqual([0x80]);
    });

    test("THEN unsigned values should use the full width", () => {
        expect([...toBigEndian(255n, 1)]).toEqual([0xFF]);
    });

    test("THEN values that don't fit should be rejected", () => {
        expect(() => toBigEndian(256n, 1)).toThrow("Value 256 does not fit in 1 bytes");
        expect(() => toBigEndian(-129n, 1)).toThrow(Error);
    });
});
