import { asciiCharToEbcdic, asciiStringToEbcdic } from "../../src/utils/CharSets.js";
import { replaceNonPrints } from "../../src/utils/Strings.js";

describe("WHEN converting character sets", () => {
    const expectations: [string, number][] = [
        [" ", 0x40], [".", 0x4B], ["(", 0x4D], ["+", 0x4E],
        ["A", 0xC1], ["I", 0xC9], ["J", 0xD1], ["R", 0xD9],
        ["S", 0xE2], ["Z", 0xE9], ["a", 0x81], ["z", 0xA9],
        ["0", 0xF0], ["9", 0xF9], ["'", 0x7D], ["=", 0x7E],
    ];

    for (const [ascii, ebcdic] of expectations) {
        describe(`GIVEN the ASCII character '${ascii}'`, () => {
            test("THEN it should convert to EBCDIC correctly", () => {
                expect(asciiCharToEbcdic(ascii)).toEqual(ebcdic);
            });
        });
    }

    describe("GIVEN a string", () => {
        test("THEN every character should be converted", () => {
            expect([...asciiStringToEbcdic("HI 1")]).toEqual([0xC8, 0xC9, 0x40, 0xF1]);
        });
    });

    describe("GIVEN a control character", () => {
        test(`THEN '${replaceNonPrints("\t")}' should be rejected`, () => {
            expect(() => asciiCharToEbcdic("\t")).toThrow("has no EBCDIC representation");
        });
    });
});
