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

import { InternalError } from "../utils/InternalError.js";
import { InstructionMeta } from "./InstructionSet.js";
import { CcwFormat } from "./Xmode.js";

export interface StorageField {
    base: number;
    displacement: number;
}

export interface FieldValues {
    r1?: number;
    r2?: number;
    r3?: number;
    x2?: number;
    i2?: number;
    l1?: number;    // length in bytes, encoded as length - 1
    s1?: StorageField;
    s2?: StorageField;
}

export class EncodingError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = EncodingError.name;
    }
}

export function unsigned(name: string, value: number, bits: number): number {
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
        throw new EncodingError(`${name} value ${value} does not fit in ${bits} bits`);
    }
    return value;
}

// accepts both the signed and the unsigned range, returns the two's complement
function twosComplement(name: string, value: number, bits: number): number {
    if (!Number.isInteger(value) || value < -(2 ** (bits - 1)) || value >= 2 ** bits) {
        throw new EncodingError(`${name} value ${value} does not fit in ${bits} bits`);
    }
    return value < 0 ? value + 2 ** bits : value;
}

function required(fields: FieldValues, name: "r1" | "r2" | "r3" | "i2"): number {
    const val = fields[name];
    if (val === undefined) {
        throw new InternalError(`Field ${name} missing`);
    }
    return val;
}

function storage(fields: FieldValues, name: "s1" | "s2"): [number, number] {
    const field = fields[name];
    if (!field) {
        throw new InternalError(`Storage field ${name} missing`);
    }
    const base = unsigned("Base register", field.base, 4);
    const disp = unsigned("Displacement", field.displacement, 12);
    return [(base << 4) | (disp >> 8), disp & 0xFF];
}

function reg(fields: FieldValues, name: "r1" | "r2" | "r3"): number {
    return unsigned("Register", required(fields, name), 4);
}

/**
 * Pack the operand fields of an instruction into its machine format.
 */
export function encodeInstruction(meta: InstructionMeta, operandFields: FieldValues): Uint8Array {
    const fields: FieldValues = { ...operandFields, ...meta.fixed };
    const op = meta.opcode;

    let bytes: number[];
    switch (meta.format) {
        case "E":
            bytes = [op >> 8, op & 0xFF];
            break;
        case "I":
            bytes = [op, unsigned("Immediate", required(fields, "i2"), 8)];
            break;
        case "RR":
            bytes = [op, (reg(fields, "r1") << 4) | reg(fields, "r2")];
            break;
        case "RRE":
            bytes = [op >> 8, op & 0xFF, 0, (reg(fields, "r1") << 4) | reg(fields, "r2")];
            break;
        case "RX":
            bytes = [op, (reg(fields, "r1") << 4) | unsigned("Index register", fields.x2 ?? 0, 4), ...storage(fields, "s2")];
            break;
        case "RS":
            bytes = [op, (reg(fields, "r1") << 4) | reg(fields, "r3"), ...storage(fields, "s2")];
            break;
        case "RSH":
            bytes = [op, reg(fields, "r1") << 4, ...storage(fields, "s2")];
            break;
        case "SI":
            bytes = [op, twosComplement("Immediate", required(fields, "i2"), 8), ...storage(fields, "s1")];
            break;
        case "S":
            bytes = [op >> 8, op & 0xFF, ...storage(fields, "s2")];
            break;
        case "SS": {
            const len = fields.l1;
            if (len === undefined) {
                throw new InternalError("Length field missing");
            }
            bytes = [op, unsigned("Length", len - 1, 8), ...storage(fields, "s1"), ...storage(fields, "s2")];
            break;
        }
        case "RI": {
            const imm = twosComplement("Immediate", required(fields, "i2"), 16);
            bytes = [op >> 4, (reg(fields, "r1") << 4) | (op & 0xF), imm >> 8, imm & 0xFF];
            break;
        }
        case "RIL": {
            const imm = twosComplement("Relative offset", required(fields, "i2"), 32);
            bytes = [
                op >> 4, (reg(fields, "r1") << 4) | (op & 0xF),
                (imm >>> 24) & 0xFF, (imm >>> 16) & 0xFF, (imm >>> 8) & 0xFF, imm & 0xFF,
            ];
            break;
        }
    }

    if (bytes.length != meta.length) {
        throw new InternalError(`${meta.mnemonic} encoded to ${bytes.length} bytes instead of ${meta.length}`);
    }
    return Uint8Array.from(bytes);
}

export interface CcwFields {
    command: number;
    address: number;
    flags: number;
    count: number;
}

// format 0 holds a 24-bit address up front, format 1 a 31-bit address at the end
export function encodeCcw(format: CcwFormat, fields: CcwFields): Uint8Array {
    const cmd = unsigned("Command code", fields.command, 8);
    const flags = unsigned("Flags", fields.flags, 8);
    const count = unsigned("Count", fields.count, 16);

    switch (format) {
        case 0: {
            const addr = unsigned("Data address", fields.address, 24);
            return Uint8Array.from([cmd, addr >> 16, (addr >> 8) & 0xFF, addr & 0xFF, flags, 0, count >> 8, count & 0xFF]);
        }
        case 1: {
            const addr = unsigned("Data address", fields.address, 31);
            return Uint8Array.from([
                cmd, flags, count >> 8, count & 0xFF,
                addr >>> 24, (addr >>> 16) & 0xFF, (addr >>> 8) & 0xFF, addr & 0xFF,
            ]);
        }
    }
}
