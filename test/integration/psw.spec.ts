import { addressOf, assemble, program } from "./TestUtils.js";

describe("GIVEN a PSW after a single byte", () => {
    const data = assemble(program(
        "         DC    X'01'",
        "RESTART  PSWBC 0,0,2,0,X'1000'",
    ));

    test("THEN it should be aligned to a doubleword", () => {
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("01" + "00".repeat(7) + "0002000000001000");
        expect(addressOf(data, "RESTART")).toEqual(8);
    });

    test("THEN its label should have the PSW length", () => {
        expect(data.result.symbols.get("RESTART")?.attributes.L).toEqual(8);
    });
});

describe("GIVEN the generic PSW directive", () => {
    const psw = "         PSW   0,0,2,0,X'1000',64";

    test("THEN it should follow the target", () => {
        expect(assemble(program("         PSW   0,0,2,0,X'1000'")).hex).toEqual("0002000000001000");
        expect(assemble(program(psw), { target: "s390x" }).hex).toEqual("00020001800000000000000000001000");
    });

    test("THEN XMODE should change its format", () => {
        const data = assemble(program(
            "         XMODE PSW,Z",
            psw,
        ));
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("00020001800000000000000000001000");
    });

    test("THEN the option should override the target", () => {
        expect(assemble(program(psw), { xmode: { psw: "PSWZ" } }).hex).toEqual("00020001800000000000000000001000");
    });

    test("THEN XMODE PSW,NONE should disable it", () => {
        const data = assemble(program(
            "         XMODE PSW,NONE",
            psw,
        ));
        expect(data.errors).toEqual(["PSW needs an XMODE PSW setting"]);
        expect(data.result.errors[0].line).toEqual(2);
    });

    test("THEN XMODE should only affect later statements", () => {
        const data = assemble(program(
            "         PSW   0,0,2,0,X'1000'",
            "         XMODE PSW,E390",
            "         PSW   0,0,2,0,X'1000',31",
        ));
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("0002000000001000" + "000A000080001000");
    });
});

describe("GIVEN a PSW that refers to a later label", () => {
    const traced: string[] = [];
    const data = assemble(program(
        "         PSWBC 0,0,2,0,GO",
        "GO       DC    H'0'",
    ), { trace: line => traced.push(line) });

    test("THEN it should wait for the label's location", () => {
        expect(traced).toContain("[early-resolve] statement 1 deferred: location of GO not assigned yet");
    });

    test("THEN it should point to the label", () => {
        expect(data.errors).toEqual([]);
        expect(data.hex).toEqual("0002000000000008" + "0000");
    });
});

describe("GIVEN invalid PSW directives", () => {
    test("THEN the address should fit the amode", () => {
        expect(assemble(program("         PSWXA 0,0,2,0,X'1000000',24")).errors)
            .toEqual(["PSWXA address value 16777216 does not fit in 24 bits"]);
    });

    test("THEN unknown XMODE settings should be rejected", () => {
        expect(assemble(program("         XMODE PSW,Q")).errors).toEqual(["XMODE PSW setting invalid: Q"]);
        expect(assemble(program("         XMODE LINK,1")).errors).toEqual(["XMODE mode not recognized: LINK"]);
    });
});

describe("GIVEN the generic CCW directive", () => {
    const ccw = [
        "         CCW   X'02',BUF,X'20',80",
        "BUF      DS    CL80",
    ];

    test("THEN XMODE CCW,1 should select format 1", () => {
        const data = assemble(program("         XMODE CCW,1", ...ccw));
        expect(data.errors).toEqual([]);
        expect(data.hex.substring(0, 16)).toEqual("0220005000000008");
    });

    test("THEN the target should select the default", () => {
        expect(assemble(program(...ccw), { target: "e390" }).hex.substring(0, 16)).toEqual("0220005000000008");
    });

    test("THEN targets without channel programs should reject it", () => {
        expect(assemble(program(...ccw), { target: "s360-20" }).errors).toEqual(["CCW needs an XMODE CCW setting"]);
    });
});
