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

import table from "./instructions.json" with { type: "json" };
import { parseIntSafe } from "../utils/Strings.js";
import { Architecture, ArchitectureLevels } from "./Targets.js";

export type Format = "E" | "I" | "RR" | "RRE" | "RX" | "RS" | "RSH" | "SI" | "S" | "SS" | "RI" | "RIL";

// what an operand looks like in the source
export type OperandKind =
    "register" |        // R
    "immediate" |       // I
    "storage" |         // D(B)
    "indexed" |         // D(X,B)
    "lengthStorage" |   // D(L,B)
    "relative";         // address, encoded as halfwords from the instruction

export type FieldName = "r1" | "r2" | "r3" | "i2";

export interface OperandSpec {
    field: FieldName | "s1" | "s2";
    kind: OperandKind;
}

export interface FormatSpec {
    length: 2 | 4 | 6;
    opcodeBits: 8 | 12 | 16;
    operands: readonly OperandSpec[];
}

export interface InstructionMeta {
    mnemonic: string;
    opcode: number;
    format: Format;
    length: number;
    architecture: Architecture;
    fixed: Partial<Record<FieldName, number>>;
    operands: readonly OperandSpec[];
}

const FormatNames: readonly Format[] = ["E", "I", "RR", "RRE", "RX", "RS", "RSH", "SI", "S", "SS", "RI", "RIL"];

export const Formats: Record<Format, FormatSpec> = {
    E:      { length: 2, opcodeBits: 16, operands: [] },
    I:      { length: 2, opcodeBits: 8,  operands: [{ field: "i2", kind: "immediate" }] },
    RR:     { length: 2, opcodeBits: 8,  operands: [{ field: "r1", kind: "register" }, { field: "r2", kind: "register" }] },
    RRE:    { length: 4, opcodeBits: 16, operands: [{ field: "r1", kind: "register" }, { field: "r2", kind: "register" }] },
    RX:     { length: 4, opcodeBits: 8,  operands: [{ field: "r1", kind: "register" }, { field: "s2", kind: "indexed" }] },
    RS:     { length: 4, opcodeBits: 8,  operands: [
        { field: "r1", kind: "register" }, { field: "r3", kind: "register" }, { field: "s2", kind: "storage" },
    ] },
    RSH:    { length: 4, opcodeBits: 8,  operands: [{ field: "r1", kind: "register" }, { field: "s2", kind: "storage" }] },
    SI:     { length: 4, opcodeBits: 8,  operands: [{ field: "s1", kind: "storage" }, { field: "i2", kind: "immediate" }] },
    S:      { length: 4, opcodeBits: 16, operands: [{ field: "s2", kind: "storage" }] },
    SS:     { length: 6, opcodeBits: 8,  operands: [{ field: "s1", kind: "lengthStorage" }, { field: "s2", kind: "storage" }] },
    RI:     { length: 4, opcodeBits: 12, operands: [{ field: "r1", kind: "register" }, { field: "i2", kind: "immediate" }] },
    RIL:    { length: 6, opcodeBits: 12, operands: [{ field: "r1", kind: "register" }, { field: "i2", kind: "relative" }] },
};

function isRecord(val: unknown): val is Record<string, unknown> {
    return typeof val == "object" && val !== null && !Array.isArray(val);
}

function parseFormat(name: unknown): Format {
    const format = FormatNames.find(f => f == name);
    if (!format) {
        throw Error(`Unknown instruction format ${String(name)}`);
    }
    return format;
}

function parseArchitecture(name: unknown): Architecture {
    const arch = ArchitectureLevels.find(a => a == name);
    if (!arch) {
        throw Error(`Unknown architecture ${String(name)}`);
    }
    return arch;
}

function parseFixed(mnemonic: string, fixed: unknown): Partial<Record<FieldName, number>> {
    const res: Partial<Record<FieldName, number>> = {};
    if (fixed === undefined) {
        return res;
    } else if (!isRecord(fixed)) {
        throw Error(`Invalid fixed fields for ${mnemonic}`);
    }

    for (const [key, value] of Object.entries(fixed)) {
        if (typeof value != "number") {
            throw Error(`Invalid fixed field ${key} for ${mnemonic}`);
        }
        switch (key) {
            case "r1": case "r2": case "r3": case "i2":
                res[key] = value;
                break;
            default:
                throw Error(`Unknown fixed field ${key} for ${mnemonic}`);
        }
    }
    return res;
}

/**
 * Encoding metadata per mnemonic, read from instructions.json.
 */
export class InstructionSet {
    private instructions = new Map<string, InstructionMeta>();

    public constructor(definitions: unknown = table) {
        if (!isRecord(definitions)) {
            throw Error("Instruction table must be an object");
        }

        for (const [mnemonic, def] of Object.entries(definitions)) {
            this.instructions.set(mnemonic.toUpperCase(), InstructionSet.parseDefinition(mnemonic.toUpperCase(), def));
        }
    }

    public lookup(mnemonic: string): InstructionMeta | undefined {
        return this.instructions.get(mnemonic.toUpperCase());
    }

    public mnemonics(): string[] {
        return [...this.instructions.keys()];
    }

    public operandFreeMnemonics(): Set<string> {
        return new Set([...this.instructions.values()].filter(i => i.operands.length == 0).map(i => i.mnemonic));
    }

    private static parseDefinition(mnemonic: string, def: unknown): InstructionMeta {
        if (!isRecord(def)) {
            throw Error(`Invalid definition for ${mnemonic}`);
        }

        const opcode = def.opcode;
        if (typeof opcode != "string") {
            throw Error(`Missing opcode for ${mnemonic}`);
        }

        const format = parseFormat(def.format);
        const spec = Formats[format];
        if (opcode.length * 4 != spec.opcodeBits) {
            throw Error(`Opcode ${opcode} of ${mnemonic} doesn't match format ${format}`);
        }

        const fixed = parseFixed(mnemonic, def.fixed);
        return {
            mnemonic: mnemonic,
            opcode: parseIntSafe(opcode, 16),
            format: format,
            length: spec.length,
            architecture: parseArchitecture(def.arch),
            fixed: fixed,
            operands: spec.operands.filter(op => !(op.field in fixed)),
        };
    }
}
