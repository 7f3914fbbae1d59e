import { StatementState } from "../../src/assembler/Statement.js";
import { absolute } from "../../src/image/Address.js";
import { addressOf, assemble, program } from "./TestUtils.js";

// eslint-disable-next-line max-lines-per-function
describe("GIVEN a program without section statements", () => {
    const data = assemble(program(
        "         DC    F'1'",
        "         DC    F'2'",
    ));

    test("THEN it should assemble without errors", () => {
        expect(data.errors).toEqual([]);
    });

    test("THEN an unnamed region at 0 should hold an unnamed section", () => {
        expect(data.result.regions.length).toEqual(1);
        const region = data.result.regions[0];
        expect(region.name).toEqual("");
        expect(region.start).toEqual(0);
        expect(region.sections.map(s => s.name)).toEqual([""]);
    });

    test("THEN the image should hold both words", () => {
        expect(data.hex).toEqual("0000000100000002");
    });

    test("THEN the second word should follow the first", () => {
        const second = data.result.statements[1].items[0].binary;
        expect(second.loc).toEqual(absolute(4));
    });

    test("THEN load point and entry should default to the region start", () => {
        expect(data.result.load).toEqual(0);
        expect(data.result.entry).toEqual(0);
    });
});

describe("GIVEN a program with START", () => {
    const data = assemble(program(
        "PROG     START X'1000'",
        "         DC    F'7'",
        "         END   PROG",
    ));

    test("THEN the section should be bound to the start address", () => {
        expect(data.errors).toEqual([]);
        expect(addressOf(data, "PROG")).toEqual(0x1000);
        expect(data.result.regions[0].start).toEqual(0x1000);
    });

    test("THEN the region should be the load point", () => {
        expect(data.result.load).toEqual(0x1000);
    });

    test("THEN END should set the entry point", () => {
        expect(data.result.entry).toEqual(0x1000);
    });

    test("THEN the image should only hold the content", () => {
        expect(data.hex).toEqual("00000007");
    });
});

describe("GIVEN a program with named regions", () => {
    describe("WHEN every region has a start address", () => {
        const data = assemble(program(
            "LOW      REGION 0",
            "A        CSECT",
            "         DC    X'AA'",
            "HIGH     REGION X'200'",
            "B        CSECT",
            "         DC    X'BB'",
        ));

        test("THEN each region should be placed at its address", () => {
            expect(data.errors).toEqual([]);
            expect(data.result.regions.map(r => [r.name, r.start, r.length])).toEqual([["LOW", 0, 1], ["HIGH", 0x200, 1]]);
        });

        test("THEN the image should concatenate the regions without gaps", () => {
            expect(data.hex).toEqual("AABB");
            expect(data.result.regions[1].imageOffset).toEqual(1);
        });

        test("THEN the region symbols should have their type", () => {
            expect(data.result.symbols.get("HIGH")?.attributes.T).toEqual("R");
            expect(data.result.symbols.get("B")?.attributes.T).toEqual("C");
        });
    });

    describe("WHEN a region has no start address", () => {
        const data = assemble(program(
            "FIRST    REGION X'100'",
            "A        CSECT",
            "         DC    X'01'",
            "SECOND   REGION",
            "B        CSECT",
            "         DC    X'02'",
            "         DC    AL1(M'B)",
        ));

        test("THEN it should follow its predecessor on a doubleword boundary", () => {
            expect(data.errors).toEqual([]);
            expect(data.result.regions[1].start).toEqual(0x108);
            expect(addressOf(data, "B")).toEqual(0x108);
        });

        test("THEN M' should give the position in the image", () => {
            expect(data.hex).toEqual("010201");
            expect(data.result.symbols.get("B")?.attributes.M).toEqual(1);
        });
    });

    describe("WHEN a section is resumed", () => {
        const data = assemble(program(
            "LOW      REGION 0",
            "A        CSECT",
            "         DC    X'01'",
            "HIGH     REGION X'100'",
            "B        CSECT",
            "         DC    X'02'",
            "A        CSECT",
            "         DC    X'03'",
        ));

        test("THEN content should go back into the section and its region", () => {
            expect(data.errors).toEqual([]);
            expect(data.result.regions.map(r => r.length)).toEqual([2, 1]);
            expect(data.hex).toEqual("010302");
        });
    });

    describe("WHEN START names a region", () => {
        const data = assemble(program(
            "PROG     START X'400',MAIN",
            "         DC    H'1'",
        ));

        test("THEN the region should be created with that name", () => {
            expect(data.errors).toEqual([]);
            expect(data.result.regions.map(r => [r.name, r.start])).toEqual([["MAIN", 0x400]]);
            expect(data.result.symbols.get("MAIN")?.attributes.T).toEqual("R");
        });
    });
});

describe("GIVEN a program with dummy sections", () => {
    const traced: string[] = [];
    const data = assemble(program(
        "MAP      DSECT",
        "FLD1     DS    F",
        "FLD2     DS    H",
        "SIZE     EQU   *-MAP",
        "CODE     CSECT",
        "         DC    A(FLD2)",
        "         DC    Y(L'MAP)",
    ), { trace: line => traced.push(line) });

    test("THEN the dummy section should not be part of the image", () => {
        expect(data.errors).toEqual([]);
        expect(data.result.dsects.map(s => [s.name, s.length, s.address])).toEqual([["MAP", 6, undefined]]);
        expect(data.result.regions[0].sections.map(s => s.name)).toEqual(["CODE"]);
    });

    test("THEN dummy section symbols should be offsets", () => {
        expect(data.hex).toEqual("000000040006");
    });

    test("THEN the equate should be deferred until the location is known", () => {
        expect(traced).toContain("[early-resolve] statement 4 deferred: location counter not established");
        expect(data.symbols["SIZE"]).toEqual(6);
        expect(data.result.symbols.get("SIZE")?.attributes.L).toEqual(6);
    });

    test("THEN the trace should cover every phase", () => {
        const phases = new Set(traced.map(line => line.substring(1, line.indexOf("]"))));
        expect([...phases]).toEqual([
            "parse", "early-resolve", "early-resolve-retry", "allocate",
            "bind", "object-generate", "consolidate", "finish",
        ]);
    });
});

describe("GIVEN a program with origin statements", () => {
    describe("WHEN moving back", () => {
        const data = assemble(program(
            "         DC    F'1'",
            "         ORG   *-4",
            "         DC    X'FF'",
            "         ORG",
            "         DC    X'EE'",
        ));

        test("THEN later content should overlay earlier content", () => {
            expect(data.errors).toEqual([]);
            expect(data.hex).toEqual("FF000001EE");
        });
    });

    describe("WHEN the target is in another section", () => {
        const data = assemble(program(
            "A        CSECT",
            "         DC    F'1'",
            "B        CSECT",
            "LB       DC    F'2'",
            "A        CSECT",
            "         ORG   LB",
            "         DC    X'FF'",
        ));

        test("THEN the allocation should fail for the whole section", () => {
            expect(data.errors).toEqual(["ORG target must be in the current section, giving up on CSECT A"]);
            expect(data.result.errors[0].line).toEqual(6);
        });

        test("THEN later statements of the section should be marked as failed", () => {
            expect(data.result.statements[6].state).toEqual(StatementState.Errored);
            expect(data.result.regions[0].sections.map(s => [s.name, s.failed])).toEqual([["A", true], ["B", false]]);
        });

        test("THEN other sections should still be generated", () => {
            expect(data.hex).toEqual("000000000000000000000002");
        });
    });
});
