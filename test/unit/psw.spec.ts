import { EncodingError } from "../../src/isa/InsnBuilder.js";
import { encodePsw, PswFields, pswAlignment, pswLength } from "../../src/isa/PswBuilder.js";
import { applyXmode, Xmode, XmodeError } from "../../src/isa/Xmode.js";
import { bytesToHex } from "../../src/utils/Strings.js";

const waitState: PswFields = { system: 0, key: 0, mode: 2, program: 0, address: 0x1000 };

describe("GIVEN the PSW encoder", () => {
    test("THEN basic control mode should put the address into the last three bytes", () => {
        expect(bytesToHex(encodePsw("PSWBC", waitState))).toEqual("0002000000001000");
    });

    test("THEN extended control mode should set bit 12", () => {
        expect(bytesToHex(encodePsw("PSWEC", waitState))).toEqual("000A000000001000");
    });

    test("THEN bimodal formats should put the amode before the address", () => {
        expect(bytesToHex(encodePsw("PSWE390", { ...waitState, amode: 31 }))).toEqual("000A000080001000");
        expect(bytesToHex(encodePsw("PSWXA", { ...waitState, amode: 24 }))).toEqual("000A000000001000");
    });

    test("THEN z/Architecture PSWs should have 16 bytes", () => {
        expect(bytesToHex(encodePsw("PSWZ", { ...waitState, amode: 64 }))).toEqual("00020001800000000000000000001000");
        expect(pswLength("PSWZ")).toEqual(16);
    });

    test("THEN the S/360 PSW should keep the program mask in the second word", () => {
        expect(bytesToHex(encodePsw("PSW360", { system: 0xFF, key: 0, mode: 0, program: 0, address: 0x100 })))
            .toEqual("FF00000000000100");
        expect(bytesToHex(encodePsw("PSW360", { system: 0, key: 0, mode: 0, program: 0x3F, address: 0 })))
            .toEqual("000000003F000000");
    });

    test("THEN the Model 20 PSW should have 4 bytes and no alignment", () => {
        expect(bytesToHex(encodePsw("PSWS", { system: 1, key: 0, mode: 0, program: 0, address: 0x1234 }))).toEqual("01001234");
        expect(bytesToHex(encodePsw("PSWS", { system: 1, key: 0, mode: 1, program: 3, address: 0 }))).toEqual("33000000");
        expect(pswAlignment("PSWS")).toEqual(1);
    });

    test("THEN every other format should be aligned to doublewords", () => {
        expect(pswAlignment("PSWBC")).toEqual(8);
        expect(pswAlignment("PSWZ")).toEqual(8);
    });

    test("THEN reserved system mask bits should be cleared", () => {
        expect(bytesToHex(encodePsw("PSWEC", { ...waitState, system: 0xFF }))).toEqual("470A000000001000");
    });

    test("THEN the address should fit the amode", () => {
        expect(() => encodePsw("PSWXA", { ...waitState, address: 0x1000000, amode: 24 }))
            .toThrow("PSWXA address value 16777216 does not fit in 24 bits");
        expect(bytesToHex(encodePsw("PSWXA", { ...waitState, address: 0x1000000, amode: 31 }))).toEqual("000A000081000000");
    });

    test("THEN invalid amodes should be rejected", () => {
        expect(() => encodePsw("PSWE390", { ...waitState, amode: 64 }))
            .toThrow("PSWE390 amode 64 is invalid, expected one of 0, 1, 24, 31");
    });

    test("THEN too wide fields should be rejected", () => {
        expect(() => encodePsw("PSWBC", { ...waitState, key: 16 })).toThrow(EncodingError);
        expect(() => encodePsw("PSWBC", { ...waitState, key: 16 })).toThrow("PSWBC key value 16 does not fit in 4 bits");
    });
});

describe("GIVEN XMODE settings", () => {
    test("THEN PSW formats should be accepted with or without prefix", () => {
        const xmode: Xmode = {};
        applyXmode(xmode, "psw", "e390");
        expect(xmode.psw).toEqual("PSWE390");
        applyXmode(xmode, "PSW", "PSWZ");
        expect(xmode.psw).toEqual("PSWZ");
    });

    test("THEN NONE should disable the generic directive", () => {
        const xmode: Xmode = { psw: "PSWBC", ccw: 0 };
        applyXmode(xmode, "PSW", "NONE");
        applyXmode(xmode, "CCW", "none");
        expect(xmode).toEqual({ psw: undefined, ccw: undefined });
    });

    test("THEN CCW formats should be accepted by number or name", () => {
        const xmode: Xmode = {};
        applyXmode(xmode, "CCW", "1");
        expect(xmode.ccw).toEqual(1);
        applyXmode(xmode, "CCW", "CCW0");
        expect(xmode.ccw).toEqual(0);
    });

    test("THEN unknown settings should be rejected", () => {
        expect(() => applyXmode({}, "PSW", "Q")).toThrow(XmodeError);
        expect(() => applyXmode({}, "PSW", "Q")).toThrow("XMODE PSW setting invalid: Q");
        expect(() => applyXmode({}, "CCW", "2")).toThrow("XMODE CCW setting invalid: 2");
        expect(() => applyXmode({}, "LINK", "1")).toThrow("XMODE mode not recognized: LINK");
    });
});
