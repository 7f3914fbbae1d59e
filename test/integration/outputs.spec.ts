import { compareBin } from "../../src/outputformats/compareBin.js";
import { IplControlFile, writeIplFiles } from "../../src/outputformats/IplWriter.js";
import { writeListing } from "../../src/outputformats/ListingWriter.js";
import { writeRcScript } from "../../src/outputformats/RcScriptWriter.js";
import { assemble, program } from "./TestUtils.js";

function listing(source: string): string[] {
    const lines: string[] = [];
    writeListing(assemble(source).result, line => lines.push(line));
    return lines;
}

describe("GIVEN the listing writer", () => {
    describe("WHEN the program is valid", () => {
        const first = "         DC    F'1'";
        const second = "A        DC    H'2'";
        const lines = listing(program(first, second));

        test("THEN each statement should show location and object code", () => {
            expect(lines.slice(0, 3)).toEqual([
                "LOC    OBJECT CODE       STMT  SOURCE",
                "000000 00000001" + " ".repeat(14) + "1 " + first,
                "000004 0002" + " ".repeat(18) + "2 " + second,
            ]);
        });

        test("THEN the symbols should follow in order", () => {
            expect(lines.slice(3)).toEqual([
                "",
                "SYMBOL                           TYPE     VALUE    LENGTH  DEFN  REFERENCES",
                `${"A".padEnd(32)} LABEL    00000004      2     2`,
                `${"IMAGE".padEnd(32)} IMAGE    00000000      6     0`,
            ]);
        });
    });

    describe("WHEN the program has errors", () => {
        const lines = listing(program("         DC    A(NOWHERE)"));

        test("THEN the errors should be listed at the end", () => {
            expect(lines.at(-2)).toEqual("1 errors");
            expect(lines.at(-1)?.startsWith("test.asm:1:")).toEqual(true);
            expect(lines.at(-1)?.endsWith(": Symbol NOWHERE not defined")).toEqual(true);
        });
    });
});

describe("GIVEN the RC script writer", () => {
    const data = assemble(program(
        "PROG     START X'100'",
        "         DC    XL20'0'",
    ));

    test("THEN each chunk should become one alter command", () => {
        expect(writeRcScript(data.result)).toEqual(
            "r 100=" + "00".repeat(16) + "\n" +
            "r 110=" + "00".repeat(4) + "\n",
        );
    });
});

describe("GIVEN the IPL writer", () => {
    describe("WHEN regions are named", () => {
        const data = assemble(program(
            "LOW      REGION 0",
            "A        CSECT",
            "         DC    X'AA'",
            "HIGH     REGION X'200'",
            "B        CSECT",
            "         DC    X'BB'",
        ));
        const files = writeIplFiles(data.result);

        test("THEN each region should get its own file", () => {
            expect(files.map(f => f.name)).toEqual(["LOW.bin", "HIGH.bin", IplControlFile]);
            expect(files[0].content).toEqual(Uint8Array.of(0xAA));
            expect(files[1].content).toEqual(Uint8Array.of(0xBB));
        });

        test("THEN the control file should list the load addresses", () => {
            expect(files[2].content).toEqual("LOW.bin 0x0\nHIGH.bin 0x200\n");
        });
    });

    describe("WHEN the region is unnamed", () => {
        const files = writeIplFiles(assemble(program("         DC    X'01'")).result);

        test("THEN it should be named by its position", () => {
            expect(files.map(f => f.name)).toEqual(["REGION0.bin", IplControlFile]);
            expect(files[1].content).toEqual("REGION0.bin 0x0\n");
        });
    });
});

describe("GIVEN two images to compare", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    afterAll(() => {
        log.mockRestore();
    });

    test("THEN identical images should match", () => {
        expect(compareBin("x", Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toEqual(true);
    });

    test("THEN every difference should be printed", () => {
        log.mockClear();
        expect(compareBin("x", Uint8Array.of(1, 2), Uint8Array.of(1, 3, 4))).toEqual(false);
        expect(log.mock.calls).toEqual([
            ["000001: our 02 != other 03 in x"],
            ["000002: our none != other 04 in x"],
        ]);
    });
});
