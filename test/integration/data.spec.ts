import { assemble, program } from "./TestUtils.js";

describe("GIVEN constants of every type", () => {
    const data = assemble(program(
        "         DC    C'AB'",
        "         DC    CL4'AB'",
        "         DC    X'1F'",
        "         DC    B'101'",
        "         DC    H'-2'",
        "         DC    3X'AA'",
        "         DC    F'1,2'",
        "         DC    XL2'12345'",
        "         DC    FD'-1'",
    ));

    test("THEN it should assemble without errors", () => {
        expect(data.errors).toEqual([]);
    });

    test("THEN character and bit constants should be packed", () => {
        expect(data.hex.substring(0, 16)).toEqual("C1C2" + "C1C24040" + "1F" + "05");
    });

    test("THEN numbers should be aligned and in two's complement", () => {
        expect(data.hex.substring(16, 20)).toEqual("FFFE");
    });

    test("THEN duplication should repeat the value", () => {
        expect(data.hex.substring(20, 26)).toEqual("AAAAAA");
    });

    test("THEN every value of a list should be stored", () => {
        expect(data.hex.substring(26, 48)).toEqual("000000" + "0000000100000002");
    });

    test("THEN hex constants should be truncated on the left", () => {
        expect(data.hex.substring(48, 52)).toEqual("2345");
    });

    test("THEN doublewords should be aligned to 8", () => {
        expect(data.hex.substring(52)).toEqual("000000000000" + "FFFFFFFFFFFFFFFF");
    });
});

describe("GIVEN address constants", () => {
    const data = assemble(program(
        "PROG     START X'2000'",
        "HERE     DC    A(HERE,*+8)",
        "         DC    Y(HERE-PROG+2)",
        "         DC    AL3(HERE)",
    ));

    test("THEN they should hold memory addresses", () => {
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("00002000" + "00002008" + "0002" + "002000");
    });
});

describe("GIVEN storage definitions", () => {
    const data = assemble(program(
        "N        EQU   3",
        "AREA     DS    (N)F",
        "         DS    0F",
        "NEXT     DC    X'01'",
    ));

    test("THEN duplication may come from an equate", () => {
        expect(data.errors).toEqual([]);
        expect(data.result.statements[1].items[0].binary.length).toEqual(12);
    });

    test("THEN zero duplication should only align", () => {
        expect(data.hex).toEqual("00".repeat(12) + "01");
    });

    test("THEN the label should get the length of one item", () => {
        expect(data.result.symbols.get("AREA")?.attributes.L).toEqual(4);
    });
});

describe("GIVEN decimal constants", () => {
    const data = assemble(program(
        "PK       DC    P'123'",
        "         DC    P'-12'",
        "ZN       DC    Z'123'",
        "         DC    Z'-12'",
        "         DC    PL3'5'",
        "         DC    D'1'",
    ));

    test("THEN they should assemble without errors", () => {
        expect(data.errors).toEqual([]);
    });

    test("THEN packed constants should end with the sign nibble", () => {
        expect(data.hex.substring(0, 8)).toEqual("123C" + "012D");
    });

    test("THEN zoned constants should carry the sign in the last byte", () => {
        expect(data.hex.substring(8, 18)).toEqual("F1F2C3" + "F1D2");
    });

    test("THEN an explicit length should pad on the left", () => {
        expect(data.hex.substring(18, 24)).toEqual("00005C");
    });

    test("THEN D should be a signed doubleword", () => {
        expect(data.hex.substring(24)).toEqual("00000000" + "0000000000000001");
    });

    test("THEN the lengths should follow the digits", () => {
        expect(data.result.symbols.get("PK")?.attributes.L).toEqual(2);
        expect(data.result.symbols.get("ZN")?.attributes.L).toEqual(3);
    });
});

describe("GIVEN storage address constants", () => {
    const data = assemble(program(
        "PROG     START X'1000'",
        "         USING *,12",
        "WORD     DC    F'7'",
        "         DC    S(WORD+4)",
    ));

    test("THEN they should hold base and displacement", () => {
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("00000007" + "C004");
    });
});

describe("GIVEN invalid constants", () => {
    test("THEN invalid decimal digits should be rejected", () => {
        expect(assemble(program("         DC    P'1A'")).errors).toEqual(["Invalid decimal constant '1A'"]);
    });

    test("THEN S-type constants should have length 2", () => {
        expect(assemble(program("         DC    SL3(0)")).errors).toEqual(["S-type constants must have length 2"]);
    });

    test("THEN S-type constants should refer to addresses", () => {
        expect(assemble(program("         DC    S(5)")).errors).toEqual(["S-type value is not an address: 5"]);
    });

    test("THEN numbers that don't fit should be rejected", () => {
        expect(assemble(program("         DC    H'70000'")).errors).toEqual(["Value 70000 does not fit in 2 bytes"]);
    });

    test("THEN invalid hex digits should be rejected", () => {
        expect(assemble(program("         DC    X'FG'")).errors).toEqual(["Invalid hex constant 'FG'"]);
    });

    test("THEN address constants need parentheses", () => {
        expect(assemble(program("         DC    A'1'")).errors).toEqual(["Type A needs expressions in parentheses"]);
    });

    test("THEN dummy section addresses should be stored as offsets", () => {
        const data = assemble(program(
            "MAP      DSECT",
            "         DS    F",
            "CODE     CSECT",
            "         DC    A(MAP+4)",
        ));
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("00000004");
    });
});
