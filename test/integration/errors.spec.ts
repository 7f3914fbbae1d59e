import { Asma } from "../../src/Asma.js";
import { ContainerAllocationError } from "../../src/assembler/AssemblerError.js";
import { assemble, program } from "./TestUtils.js";

describe("GIVEN a program with symbol errors", () => {
    test("THEN duplicate labels should be reported", () => {
        const data = assemble(program(
            "X        DC    F'1'",
            "X        DC    F'2'",
        ));
        expect(data.errors).toEqual(["Symbol X already defined"]);
        expect(data.result.errors[0].line).toEqual(2);
        expect(data.result.image.length).toEqual(4);
    });

    test("THEN the image name should not be usable as a label", () => {
        const data = assemble(program("IMAGE    DC    F'1'"));
        expect(data.errors).toEqual(["Symbol IMAGE is the name of the image"]);
    });

    test("THEN the image name should be configurable", () => {
        const data = assemble(program("IMAGE    DC    F'1'"), { imageName: "CORE" });
        expect(data.errors).toEqual([]);
        expect(data.result.imageName).toEqual("CORE");
    });
});

describe("GIVEN a program with parse errors", () => {
    const source = program(
        "         DC    F'1'",
        "         DC    F'2",
    );

    test("THEN no image should be produced", () => {
        const data = assemble(source);
        expect(data.errors).toEqual(["Unterminated string"]);
        expect(data.result.image.length).toEqual(0);
        expect(data.result.statements).toEqual([]);
    });

    test("THEN failFast should throw the error", () => {
        expect(() => assemble(source, { failFast: true })).toThrow("Unterminated string");
    });
});

describe("GIVEN failFast", () => {
    test("THEN allocation errors should be thrown", () => {
        const source = program(
            "A        CSECT",
            "         DC    F'1'",
            "B        CSECT",
            "LB       DC    F'2'",
            "A        CSECT",
            "         ORG   LB",
        );
        expect(() => assemble(source, { failFast: true })).toThrow(ContainerAllocationError);
    });

    test("THEN a clean program should still assemble", () => {
        expect(assemble(program("         DC    H'1'"), { failFast: true }).hex).toEqual("0001");
    });
});

describe("GIVEN entry point statements", () => {
    test("THEN ENTRY should set the entry point", () => {
        const data = assemble(program(
            "A        DC    F'1'",
            "B        DC    F'2'",
            "         ENTRY B",
        ));
        expect(data.errors).toEqual([]);
        expect(data.result.entry).toEqual(4);
    });

    test("THEN a second ENTRY should be rejected", () => {
        const data = assemble(program(
            "A        DC    F'1'",
            "         ENTRY A",
            "         ENTRY A",
        ));
        expect(data.errors).toEqual(["Entry point already set"]);
        expect(data.result.statements[2].error?.message).toEqual("Entry point already set");
    });

    test("THEN END should override ENTRY", () => {
        const data = assemble(program(
            "A        DC    F'1'",
            "B        DC    F'2'",
            "         ENTRY B",
            "         END   A",
        ));
        expect(data.errors).toEqual([]);
        expect(data.result.entry).toEqual(0);
    });

    test("THEN statements after END should be ignored", () => {
        const data = assemble(program(
            "         DC    F'1'",
            "         END",
            "         DC    F'2'",
        ));
        expect(data.hex).toEqual("00000001");
        expect(data.result.statements[2].ignore).toEqual(true);
    });
});

describe("GIVEN an address width", () => {
    const source = program(
        "PROG     START X'FFFC'",
        "         DC    F'1'",
        "         DC    F'2'",
    );

    test("THEN regions beyond it should be reported", () => {
        const data = assemble(source, { target: "s360-20" });
        expect(data.errors).toEqual(["unnamed region ends at 010004, beyond the 16-bit address space"]);
        expect(data.result.errors[0].line).toEqual(1);
    });

    test("THEN a wider address space should accept them", () => {
        expect(assemble(source, { target: "s360-20", addressWidth: 24 }).errors).toEqual([]);
    });

    test("THEN unsupported widths should be rejected", () => {
        expect(() => new Asma({ addressWidth: 20 })).toThrow("Unsupported address width 20, expected one of 16, 24, 31, 64");
    });
});

describe("GIVEN several inputs", () => {
    const asma = new Asma();
    asma.addInput("a.asm", program("         DC    F'1'"));
    asma.addInput("b.asm", program(
        "X        DC    F'2'",
        "         DC    A(NOWHERE)",
    ));
    const result = asma.run();

    test("THEN statements should be numbered across inputs", () => {
        expect(result.statements.map(s => s.stmtNo)).toEqual([1, 2, 3]);
        expect(result.symbols.get("X")?.definedAt).toEqual(2);
    });

    test("THEN errors should name their input", () => {
        expect(result.errors.map(e => [e.inputName, e.line])).toEqual([["b.asm", 2]]);
        expect(result.statements[2].error?.message).toEqual("Symbol NOWHERE not defined");
    });

    test("THEN the assembler should only run once", () => {
        expect(() => asma.run()).toThrow("Assembler can only run once");
    });
});
