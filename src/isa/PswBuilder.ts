/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { EncodingError, unsigned } from "./InsnBuilder.js";

export type PswFormat =
    "PSWS" | "PSW360" | "PSW67" | "PSWBC" | "PSWEC" |
    "PSW380" | "PSWXA" | "PSWE370" | "PSWE390" | "PSWZ";

export const PswFormats: readonly PswFormat[] = [
    "PSWS", "PSW360", "PSW67", "PSWBC", "PSWEC",
    "PSW380", "PSWXA", "PSWE370", "PSWE390", "PSWZ",
];

// operands of all PSW directives, mode is A, AMWP or MWP depending on the format
export interface PswFields {
    system: number;
    key: number;
    mode: number;
    program: number;
    address: number;
    amode?: number;
}

type FieldName = keyof PswFields;

// bits count from the leftmost bit of the PSW
interface FieldLayout {
    name: FieldName;
    start: number;
    bits: number;
    mask?: number;  // reserved bits are cleared
}

interface PswLayout {
    length: number;
    alignment: number;
    fields: FieldLayout[];
    fixedBit?: number;
    amodes?: ReadonlyMap<number, number>;
    // address bits allowed per encoded amode
    addressBits?: ReadonlyMap<number, number>;
}

const BiModes = new Map([[0, 0], [1, 1], [24, 0], [31, 1]]);
const Model67Modes = new Map([[0, 0], [1, 1], [24, 0], [32, 1]]);
const TriModes = new Map([[0, 0], [1, 1], [3, 3], [24, 0], [31, 1], [64, 3]]);

function bimodal(programMask: number): PswLayout {
    return {
        length: 8,
        alignment: 8,
        fields: [
            { name: "system", start: 0, bits: 8, mask: 0x47 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 13, bits: 3 },
            { name: "program", start: 16, bits: 8, mask: programMask },
            { name: "amode", start: 32, bits: 1 },
            { name: "address", start: 33, bits: 31 },
        ],
        fixedBit: 12,
        amodes: BiModes,
        addressBits: new Map([[0, 24]]),
    };
}

const Layouts: Record<PswFormat, PswLayout> = {
    PSWS: {
        length: 4,
        alignment: 1,
        fields: [
            { name: "system", start: 7, bits: 1 },
            { name: "mode", start: 6, bits: 1 },
            { name: "program", start: 2, bits: 2 },
            { name: "address", start: 16, bits: 16 },
        ],
    },
    PSW360: {
        length: 8,
        alignment: 8,
        fields: [
            { name: "system", start: 0, bits: 8 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 12, bits: 4 },
            { name: "program", start: 34, bits: 6 },
            { name: "address", start: 40, bits: 24 },
        ],
    },
    PSW67: {
        length: 8,
        alignment: 8,
        fields: [
            { name: "amode", start: 4, bits: 1 },
            { name: "system", start: 5, bits: 3 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 12, bits: 4 },
            { name: "program", start: 16, bits: 8 },
            { name: "address", start: 32, bits: 32 },
        ],
        amodes: Model67Modes,
    },
    PSWBC: {
        length: 8,
        alignment: 8,
        fields: [
            { name: "system", start: 0, bits: 8 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 13, bits: 3 },
            { name: "program", start: 34, bits: 6 },
            { name: "address", start: 40, bits: 24 },
        ],
    },
    PSWEC: {
        length: 8,
        alignment: 8,
        fields: [
            { name: "system", start: 0, bits: 8, mask: 0x47 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 13, bits: 3 },
            { name: "program", start: 16, bits: 8, mask: 0xBF },
            { name: "address", start: 40, bits: 24 },
        ],
        fixedBit: 12,
    },
    PSW380: bimodal(0xBF),
    PSWXA: bimodal(0xBF),
    PSWE370: bimodal(0xFF),
    PSWE390: bimodal(0xFF),
    PSWZ: {
        length: 16,
        alignment: 8,
        fields: [
            { name: "system", start: 0, bits: 8 },
            { name: "key", start: 8, bits: 4 },
            { name: "mode", start: 13, bits: 3 },
            { name: "program", start: 16, bits: 8 },
            { name: "amode", start: 31, bits: 2 },
            { name: "address", start: 64, bits: 64 },
        ],
        amodes: TriModes,
        addressBits: new Map([[0, 24], [1, 31]]),
    },
};

export function pswLength(format: PswFormat): number {
    return Layouts[format].length;
}

export function pswAlignment(format: PswFormat): number {
    return Layouts[format].alignment;
}

function encodeAmode(format: PswFormat, layout: PswLayout, amode: number): number {
    if (!layout.amodes) {
        return 0;
    }

    const encoded = layout.amodes.get(amode);
    if (encoded === undefined) {
        throw new EncodingError(`${format} amode ${amode} is invalid, expected one of ${[...layout.amodes.keys()].join(", ")}`);
    }
    return encoded;
}

/**
 * Pack the operands of a PSW directive into the given PSW format.
 * Operands the format has no field for are ignored.
 */
export function encodePsw(format: PswFormat, fields: PswFields): Uint8Array {
    const layout = Layouts[format];
    const totalBits = BigInt(layout.length * 8);
    const values: PswFields = { ...fields, amode: encodeAmode(format, layout, fields.amode ?? 0) };

    const limit = values.amode !== undefined ? layout.addressBits?.get(values.amode) : undefined;
    if (limit !== undefined) {
        unsigned(`${format} address`, values.address, limit);
    }

    let psw = layout.fixedBit !== undefined ? 1n << (totalBits - BigInt(layout.fixedBit) - 1n) : 0n;
    for (const field of layout.fields) {
        let value = unsigned(`${format} ${field.name}`, values[field.name] ?? 0, field.bits);
        if (field.mask !== undefined) {
            value &= field.mask;
        }
        psw |= BigInt(value) << (totalBits - BigInt(field.start + field.bits));
    }

    const res = new Uint8Array(layout.length);
    for (let i = layout.length - 1; i >= 0; i--) {
        res[i] = Number(psw & 0xFFn);
        psw >>= 8n;
    }
    return res;
}
