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

import { isAddress } from "../../image/Address.js";
import { Arena } from "../../image/Arena.js";
import { Binary } from "../../image/Binary.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { DataType, NodeType } from "../../parser/nodes/Node.js";
import * as CharSets from "../../utils/CharSets.js";
import { SubComponents } from "../Assembler.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { DataItem, StatementRecord } from "../Statement.js";
import { Deferred, ExprEvaluator, isDeferred } from "../util/ExprEvaluator.js";
import { DisplacementBits } from "./InsnAssembler.js";
import { SectionAssembler } from "./SectionAssembler.js";
import { SymbolAssembler } from "./SymbolAssembler.js";

interface TypeInfo {
    alignment: number;
    length?: number;    // implicit length unless it depends on the value
}

const DataTypes: Record<DataType, TypeInfo> = {
    C:  { alignment: 1 },
    X:  { alignment: 1 },
    B:  { alignment: 1 },
    P:  { alignment: 1 },
    Z:  { alignment: 1 },
    H:  { alignment: 2, length: 2 },
    Y:  { alignment: 2, length: 2 },
    S:  { alignment: 2, length: 2 },
    F:  { alignment: 4, length: 4 },
    A:  { alignment: 4, length: 4 },
    D:  { alignment: 8, length: 8 },
    FD: { alignment: 8, length: 8 },
    AD: { alignment: 8, length: 8 },
};

// two's complement for negative values, range checked
export function toBigEndian(value: bigint, length: number): Uint8Array {
    const bits = BigInt(length * 8);
    if (value < -(1n << (bits - 1n)) || value >= (1n << bits)) {
        throw Error(`Value ${value} does not fit in ${length} bytes`);
    }

    let rest = value < 0n ? value + (1n << bits) : value;
    const res = new Uint8Array(length);
    for (let i = length - 1; i >= 0; i--) {
        res[i] = Number(rest & 0xFFn);
        rest >>= 8n;
    }
    return res;
}

// keeps the rightmost bits if the value is too long
function truncateLeft(value: bigint, length: number): Uint8Array {
    return toBigEndian(value & ((1n << BigInt(length * 8)) - 1n), length);
}

function parseDecimal(text: string): bigint {
    const trimmed = text.trim();
    if (!trimmed.match(/^[+-]?[0-9]+$/)) {
        throw Error(`Invalid decimal constant '${text}'`);
    }
    return BigInt(trimmed.startsWith("+") ? trimmed.substring(1) : trimmed);
}

interface DecimalDigits {
    negative: boolean;
    digits: string;
}

// P and Z constants: an optional sign and digits, a decimal point only marks the scale
function parseDecimalDigits(text: string): DecimalDigits {
    const match = text.trim().match(/^([+-]?)([0-9]*)\.?([0-9]*)$/);
    if (!match || match[2].length + match[3].length == 0) {
        throw Error(`Invalid decimal constant '${text}'`);
    }
    return { negative: match[1] == "-", digits: match[2] + match[3] };
}

// keeps the rightmost characters, padding with zeros on the left
function fitLeft(text: string, length: number): string {
    return text.length > length ? text.substring(text.length - length) : text.padStart(length, "0");
}

function encodePacked(value: DecimalDigits, len: number): Uint8Array {
    const nibbles = fitLeft(value.digits + (value.negative ? "D" : "C"), len * 2);
    const res = new Uint8Array(len);
    for (let i = 0; i < len; i++) {
        res[i] = Number.parseInt(nibbles.substring(i * 2, i * 2 + 2), 16);
    }
    return res;
}

function encodeZoned(value: DecimalDigits, len: number): Uint8Array {
    const digits = fitLeft(value.digits, len);
    const res = new Uint8Array(len);
    for (let i = 0; i < len; i++) {
        res[i] = 0xF0 | Number.parseInt(digits[i], 10);
    }
    res[len - 1] = (value.negative ? 0xD0 : 0xC0) | (res[len - 1] & 0x0F);
    return res;
}

/**
 * Assembler for DC and DS. Every operand gets its own binary so that each
 * one is aligned separately.
 */
export class DataAssembler {
    private arena: Arena;
    private evaluator: ExprEvaluator;
    private sections: SectionAssembler;
    private symbols: SymbolAssembler;

    public constructor(components: SubComponents, sections: SectionAssembler, symbols: SymbolAssembler) {
        this.arena = components.arena;
        this.evaluator = components.evaluator;
        this.sections = sections;
        this.symbols = symbols;
    }

    public parse(ctx: Context, rec: StatementRecord, stmt: Nodes.DefineConstantStatement | Nodes.DefineStorageStatement) {
        for (const operand of stmt.operands) {
            if (operand.dataType == "S" && operand.explicitLength !== undefined && operand.explicitLength != 2) {
                throw new AssemblerError("S-type constants must have length 2", operand);
            }
            const itemLength = this.itemLength(operand);
            const valueCount = Math.max(1, this.values(operand).length);
            const alignment = operand.explicitLength === undefined ? DataTypes[operand.dataType].alignment : 1;

            const binary = this.arena.newBinary(alignment);
            this.sections.place(ctx, rec, binary);
            rec.items.push({ operand, binary, itemLength, valueCount });
        }

        // the label gets the attributes of the first operand
        const first = rec.items[0];
        if (first) {
            this.symbols.defineLabel(rec, first.binary, first.itemLength);
        }
    }

    // duplication factors can refer to symbols, so lengths might be deferred
    public resolveLengths(ctx: Context, rec: StatementRecord): Deferred | undefined {
        for (const item of rec.items) {
            if (item.binary.hasLength()) {
                continue;
            }

            const dup = this.resolveDuplication(ctx, rec, item);
            if (isDeferred(dup)) {
                return dup;
            }
            item.duplication = dup;
            item.binary.setLength(dup * (item.valueCount ?? 1) * (item.itemLength ?? 1));
        }
        return undefined;
    }

    public generate(ctx: Context, rec: StatementRecord, stmt: Nodes.DefineConstantStatement | Nodes.DefineStorageStatement) {
        for (const item of rec.items) {
            const length = item.binary.size();
            if (stmt.type == NodeType.DefineStorage || length == 0) {
                item.binary.build(new Uint8Array(length));
                continue;
            }

            const single = this.encodeValues(ctx, rec, item);
            const bytes = new Uint8Array(length);
            for (let pos = 0; pos < length; pos += single.length) {
                bytes.set(single, pos);
            }
            item.binary.build(bytes);
        }
    }

    private resolveDuplication(ctx: Context, rec: StatementRecord, item: DataItem): number | Deferred {
        const dupExpr = item.operand.duplication;
        if (!dupExpr) {
            return 1;
        }

        const dup = this.evaluator.tryEval(ctx, dupExpr, rec.stmtNo);
        if (isDeferred(dup)) {
            return dup;
        } else if (typeof dup != "number" || !Number.isInteger(dup) || dup < 0) {
            throw new AssemblerError("Duplication factor must be a non-negative integer", dupExpr);
        }
        return dup;
    }

    private itemLength(operand: Nodes.DataOperand): number {
        if (operand.explicitLength !== undefined) {
            return operand.explicitLength;
        }

        const implicit = DataTypes[operand.dataType].length;
        if (implicit !== undefined) {
            return implicit;
        }

        const [value] = this.values(operand);
        if (value === undefined || value.type != NodeType.QuotedValue) {
            return 1;
        }

        switch (operand.dataType) {
            case "X":   return Math.ceil(value.text.length / 2);
            case "B":   return Math.ceil(value.text.length / 8);
            case "P":   return Math.ceil((parseDecimalDigits(value.text).digits.length + 1) / 2);
            case "Z":   return parseDecimalDigits(value.text).digits.length;
            default:    return value.text.length;
        }
    }

    // the nominal values of one operand, each quoted number or expression is one value
    private values(operand: Nodes.DataOperand): (Nodes.QuotedValue | Nodes.Expression)[] {
        const nominal = operand.nominal;
        if (!nominal) {
            return [];
        }

        switch (operand.dataType) {
            case "C":
            case "X":
            case "B":
            case "P":
            case "Z":
                if (nominal.type != NodeType.QuotedValue) {
                    throw new AssemblerError(`Type ${operand.dataType} needs a quoted value`, nominal);
                } else if (nominal.text.length == 0) {
                    throw new AssemblerError("Empty constant", nominal);
                }
                return [nominal];
            case "F":
            case "H":
            case "D":
            case "FD":
                if (nominal.type != NodeType.QuotedValue) {
                    throw new AssemblerError(`Type ${operand.dataType} needs quoted numbers`, nominal);
                }
                return nominal.text.split(",").map(text => ({ ...nominal, text }));
            case "A":
            case "Y":
            case "S":
            case "AD":
                if (nominal.type != NodeType.ExprList) {
                    throw new AssemblerError(`Type ${operand.dataType} needs expressions in parentheses`, nominal);
                }
                return nominal.exprs;
        }
    }

    // one copy of all values of an operand, without duplication
    private encodeValues(ctx: Context, rec: StatementRecord, item: DataItem): Uint8Array {
        const operand = item.operand;
        const len = item.itemLength ?? 1;
        const values = this.values(operand);
        const res = new Uint8Array(values.length * len);

        values.forEach((value, i) => {
            let bytes: Uint8Array;
            if (value.type == NodeType.QuotedValue) {
                bytes = this.encodeQuoted(operand.dataType, value, len);
            } else if (operand.dataType == "S") {
                bytes = this.encodeStorage(ctx, rec, value);
            } else {
                const num = this.evaluator.safeAbsolute(ctx, value, rec.stmtNo);
                bytes = toBigEndian(BigInt(num), len);
            }
            res.set(bytes, i * len);
        });
        return res;
    }

    private encodeQuoted(type: DataType, value: Nodes.QuotedValue, len: number): Uint8Array {
        switch (type) {
            case "C": {
                const res = new Uint8Array(len).fill(CharSets.EbcdicSpace);
                res.set(CharSets.asciiStringToEbcdic(value.text).subarray(0, len));
                return res;
            }
            case "X":
                if (!value.text.match(/^[0-9A-Fa-f]+$/)) {
                    throw new AssemblerError(`Invalid hex constant '${value.text}'`, value);
                }
                return truncateLeft(BigInt(`0x${value.text}`), len);
            case "B":
                if (!value.text.match(/^[01]+$/)) {
                    throw new AssemblerError(`Invalid binary constant '${value.text}'`, value);
                }
                return truncateLeft(BigInt(`0b${value.text}`), len);
            case "F":
            case "H":
            case "D":
            case "FD":
                return toBigEndian(parseDecimal(value.text), len);
            case "P":
                return encodePacked(parseDecimalDigits(value.text), len);
            case "Z":
                return encodeZoned(parseDecimalDigits(value.text), len);
            case "A":
            case "Y":
            case "S":
            case "AD":
                throw new AssemblerError(`Type ${type} needs expressions in parentheses`, value);
        }
    }

    // base and displacement of an address, as in storage operands
    private encodeStorage(ctx: Context, rec: StatementRecord, expr: Nodes.Expression): Uint8Array {
        const val = this.evaluator.safeEval(ctx, expr, rec.stmtNo);
        if (!isAddress(val)) {
            throw new AssemblerError(`S-type value is not an address: ${val}`, expr);
        }
        const res = ctx.baseMgr.resolve(val, DisplacementBits);
        return toBigEndian(BigInt((res.register << 12) | res.displacement), 2);
    }
}
