import { absolute } from "../../src/image/Address.js";
import { assemble, program } from "./TestUtils.js";

describe("GIVEN equates with self-defining terms", () => {
    const data = assemble(program(
        "VC       EQU   C'AB'",
        "VX       EQU   X'FF'",
        "VB       EQU   B'1010'",
        "VDIV     EQU   7/2",
        "VZERO    EQU   5/0",
        "VNEG     EQU   -3+1",
        "VMIX     EQU   (VX+1)*2-VB",
    ));

    test("THEN they should evaluate without errors", () => {
        expect(data.errors).toEqual([]);
    });

    test("THEN character terms should use EBCDIC", () => {
        expect(data.symbols["VC"]).toEqual(0xC1C2);
    });

    test("THEN hex and binary terms should evaluate", () => {
        expect(data.symbols["VX"]).toEqual(255);
        expect(data.symbols["VB"]).toEqual(10);
    });

    test("THEN division should truncate and division by zero should give zero", () => {
        expect(data.symbols["VDIV"]).toEqual(3);
        expect(data.symbols["VZERO"]).toEqual(0);
    });

    test("THEN unary minus and parentheses should work", () => {
        expect(data.symbols["VNEG"]).toEqual(-2);
        expect(data.symbols["VMIX"]).toEqual(502);
    });

    test("THEN plain values should have type L and length 1", () => {
        const sym = data.result.symbols.get("VX");
        expect(sym?.attributes.T).toEqual("L");
        expect(sym?.attributes.L).toEqual(1);
    });
});

describe("GIVEN equates that refer to addresses", () => {
    const data = assemble(program(
        "R12      EQU   12",
        "BUF      DS    CL80",
        "BUFLEN   EQU   L'BUF",
        "BUFEND   EQU   BUF+BUFLEN",
        "LATER    EQU   FWD",
        "WIDE     EQU   BUF,256",
        "FWD      DC    F'0'",
    ));

    test("THEN they should evaluate without errors", () => {
        expect(data.errors).toEqual([]);
    });

    test("THEN lengths should be available as values", () => {
        expect(data.symbols["BUFLEN"]).toEqual(80);
    });

    test("THEN address equates should become memory addresses", () => {
        expect(data.symbols["BUFEND"]).toEqual(absolute(80, 80));
        expect(data.result.symbols.get("BUFEND")?.attributes.T).toEqual("A");
    });

    test("THEN forward references should be resolved after allocation", () => {
        expect(data.symbols["LATER"]).toEqual(absolute(80, 4));
        expect(data.result.symbols.get("LATER")?.attributes.L).toEqual(4);
    });

    test("THEN an explicit length should win", () => {
        expect(data.result.symbols.get("WIDE")?.attributes.L).toEqual(256);
    });
});

describe("GIVEN the image symbol", () => {
    const data = assemble(program(
        "         DC    F'1'",
        "         DC    AL1(L'IMAGE)",
    ), { imageName: "IMAGE" });

    test("THEN it should be defined with the image length", () => {
        const sym = data.result.symbols.get("IMAGE");
        expect(sym?.attributes.T).toEqual("I");
        expect(sym?.attributes.L).toEqual(5);
        expect(sym?.attributes.M).toEqual(0);
    });

    test("THEN its length should be usable in constants", () => {
        expect(data.hex).toEqual("0000000105");
    });
});

describe("GIVEN an equate of the image length", () => {
    const traced: string[] = [];
    const data = assemble(program(
        "LEN      EQU   L'IMAGE",
        "         DC    F'1'",
        "         DC    A(LEN)",
    ), { trace: line => traced.push(line) });

    test("THEN it should wait for bind", () => {
        expect(traced).toContain("[early-resolve] statement 1 deferred: length of IMAGE not known yet");
    });

    test("THEN it should get the final image length", () => {
        expect(data.errors).toEqual([]);
        expect(data.symbols["LEN"]).toEqual(8);
        expect(data.hex).toEqual("0000000100000008");
    });

    test("THEN the image should not be usable as an address", () => {
        expect(assemble(program("         DC    A(IMAGE)")).errors).toEqual(["Image IMAGE has no address"]);
    });
});

describe("GIVEN invalid expressions", () => {
    test("THEN circular equates should be reported", () => {
        const data = assemble(program(
            "A        EQU   B",
            "B        EQU   A",
        ));
        expect(data.errors).toEqual([
            "Can't resolve A: B not resolved yet",
            "Can't resolve B: A not resolved yet",
        ]);
    });

    test("THEN undefined symbols should be reported", () => {
        expect(assemble(program("         DC    A(NOWHERE)")).errors).toEqual(["Symbol NOWHERE not defined"]);
    });

    test("THEN too wide hex terms should be rejected", () => {
        expect(assemble(program("X        EQU   X'123456789'")).errors)
            .toEqual(["Self-defining term X'123456789' must have 1 to 32 bits"]);
    });

    test("THEN too long character terms should be rejected", () => {
        expect(assemble(program("X        EQU   C'ABCDE'")).errors).toEqual(["Character term C'ABCDE' needs 1 to 4 characters"]);
    });

    test("THEN adding two addresses should be rejected", () => {
        const data = assemble(program(
            "A        DC    F'1'",
            "B        EQU   A+A",
        ));
        expect(data.errors).toEqual(["Can't add addresses 000000 and 000000"]);
    });

    test("THEN symbols should be case insensitive unless requested", () => {
        const source = program(
            "Loop     DC    F'1'",
            "         DC    A(LOOP)",
        );
        expect(assemble(source).errors).toEqual([]);
        expect(assemble(source, { caseSensitive: true }).errors).toEqual(["Symbol LOOP not defined"]);
    });
});
