import { SymbolType } from "../../src/assembler/SymbolData.js";
import { SymbolTable, SymbolTableError } from "../../src/assembler/SymbolTable.js";

describe("GIVEN a case insensitive symbol table", () => {
    const syms = new SymbolTable(false);
    const sym = syms.define("loop", { type: SymbolType.Label, binaryId: 3 }, { L: 4, S: 0, I: 0, T: "A" }, 7);

    test("THEN names should be normalized", () => {
        expect(sym.name).toEqual("LOOP");
        expect(syms.lookup("Loop")).toBe(sym);
    });

    test("THEN redefining with the same value should be accepted", () => {
        expect(syms.define("LOOP", { type: SymbolType.Label, binaryId: 3 }, { S: 0, I: 0, T: "A" }, 9)).toBe(sym);
    });

    test("THEN redefining with another value should fail", () => {
        try {
            syms.define("LOOP", { type: SymbolType.Label, binaryId: 4 }, { S: 0, I: 0, T: "A" }, 9);
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(SymbolTableError);
            if (e instanceof SymbolTableError) {
                expect(e.reason).toEqual("duplicate");
                expect(e.message).toEqual("Symbol LOOP already defined");
            }
        }
    });

    test("THEN references should be recorded once per statement", () => {
        syms.reference("loop", 10);
        syms.reference("LOOP", 10);
        syms.reference("LOOP", 12);
        expect(sym.references).toEqual([10, 12]);
    });

    test("THEN unknown symbols should fail", () => {
        expect(syms.tryLookup("NOPE")).toBeUndefined();
        expect(() => syms.lookup("nope")).toThrow("Symbol NOPE not defined");
    });

    test("THEN the image name should not be redefinable", () => {
        syms.define("core", { type: SymbolType.Image }, { S: 0, I: 0, T: "I" }, 0);
        try {
            syms.define("CORE", { type: SymbolType.Label, binaryId: 5 }, { S: 0, I: 0, T: "A" }, 3);
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(SymbolTableError);
            if (e instanceof SymbolTableError) {
                expect(e.reason).toEqual("image");
                expect(e.message).toEqual("Symbol CORE is the name of the image");
            }
        }
    });
});

describe("GIVEN a case sensitive symbol table", () => {
    const syms = new SymbolTable(true);
    syms.define("Buf", { type: SymbolType.Equate, value: 1 }, { S: 0, I: 0, T: "L" }, 1);

    test("THEN names should differ by case", () => {
        expect(syms.tryLookup("BUF")).toBeUndefined();
        expect(syms.lookup("Buf").name).toEqual("Buf");
    });
});
