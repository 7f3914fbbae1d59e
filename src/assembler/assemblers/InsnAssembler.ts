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

import { Address, isAddress, subValues } from "../../image/Address.js";
import { Arena } from "../../image/Arena.js";
import { Binary } from "../../image/Binary.js";
import { encodeCcw, encodeInstruction, FieldValues, StorageField } from "../../isa/InsnBuilder.js";
import { InstructionMeta, InstructionSet, OperandSpec } from "../../isa/InstructionSet.js";
import { supportsArchitecture, TargetSpec } from "../../isa/Targets.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { InternalError } from "../../utils/InternalError.js";
import { SubComponents } from "../Assembler.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { StatementRecord } from "../Statement.js";
import { Deferred, ExprEvaluator, isDeferred } from "../util/ExprEvaluator.js";
import { SectionAssembler } from "./SectionAssembler.js";
import { SymbolAssembler } from "./SymbolAssembler.js";

export const DisplacementBits = 12;
export const CcwLength = 8;

/**
 * Assembler for machine instructions and channel command words.
 */
export class InsnAssembler {
    private arena: Arena;
    private evaluator: ExprEvaluator;
    private instructions: InstructionSet;
    private target: TargetSpec;
    private sections: SectionAssembler;
    private symbols: SymbolAssembler;

    public constructor(components: SubComponents, sections: SectionAssembler, symbols: SymbolAssembler) {
        this.arena = components.arena;
        this.evaluator = components.evaluator;
        this.instructions = components.instructions;
        this.target = components.target;
        this.sections = sections;
        this.symbols = symbols;
    }

    public parseInstruction(ctx: Context, rec: StatementRecord, stmt: Nodes.InstructionStatement) {
        const meta = this.lookup(stmt);
        const binary = this.arena.newBinary(2, meta.length);
        rec.binary = binary;
        this.sections.place(ctx, rec, binary);
        this.symbols.defineLabel(rec, binary, meta.length);
    }

    public parseCcw(ctx: Context, rec: StatementRecord, stmt: Nodes.CcwStatement) {
        const format = stmt.format ?? ctx.xmode.ccw;
        if (format === undefined) {
            throw new AssemblerError("CCW needs an XMODE CCW setting", stmt);
        }
        rec.ccwFormat = format;

        const binary = this.arena.newBinary(CcwLength, CcwLength);
        rec.binary = binary;
        this.sections.place(ctx, rec, binary);
        this.symbols.defineLabel(rec, binary, CcwLength);
    }

    // first operand that has to wait for a later phase, if any
    public resolveOperands(ctx: Context, rec: StatementRecord, stmt: Nodes.InstructionStatement | Nodes.CcwStatement): Deferred | undefined {
        let exprs: Nodes.Expression[];
        if (stmt.type == NodeType.Ccw) {
            exprs = [stmt.command, stmt.address, stmt.flags, stmt.count];
        } else {
            exprs = stmt.operands.flatMap(op => [op.expr, ...(op.subfields ?? [])]).filter((e): e is Nodes.Expression => e !== undefined);
        }

        for (const expr of exprs) {
            const res = this.evaluator.tryEval(ctx, expr, rec.stmtNo);
            if (isDeferred(res)) {
                return res;
            }
        }
        return undefined;
    }

    public generateInstruction(ctx: Context, rec: StatementRecord, stmt: Nodes.InstructionStatement, binary: Binary) {
        const meta = this.lookup(stmt);
        if (stmt.operands.length != meta.operands.length) {
            throw new AssemblerError(`${meta.mnemonic} expects ${meta.operands.length} operands, got ${stmt.operands.length}`, stmt);
        }

        const fields: FieldValues = {};
        meta.operands.forEach((spec, i) => {
            this.resolveOperand(ctx, rec, spec, stmt.operands[i], fields, binary);
        });
        binary.build(encodeInstruction(meta, fields));
    }

    public generateCcw(ctx: Context, rec: StatementRecord, stmt: Nodes.CcwStatement, binary: Binary) {
        if (rec.ccwFormat === undefined) {
            throw new InternalError(`CCW format of statement ${rec.stmtNo} not set`);
        }
        binary.build(encodeCcw(rec.ccwFormat, {
            command: this.evaluator.safeInteger(ctx, stmt.command, rec.stmtNo),
            address: this.evaluator.safeAbsolute(ctx, stmt.address, rec.stmtNo),
            flags: this.evaluator.safeInteger(ctx, stmt.flags, rec.stmtNo),
            count: this.evaluator.safeInteger(ctx, stmt.count, rec.stmtNo),
        }));
    }

    private lookup(stmt: Nodes.InstructionStatement): InstructionMeta {
        const meta = this.instructions.lookup(stmt.mnemonic);
        if (!meta) {
            throw new AssemblerError(`Unknown instruction ${stmt.mnemonic}`, stmt);
        } else if (!supportsArchitecture(this.target, meta.architecture)) {
            throw new AssemblerError(`${meta.mnemonic} needs architecture ${meta.architecture}, target is ${this.target.name}`, stmt);
        }
        return meta;
    }

    private resolveOperand(ctx: Context, rec: StatementRecord, spec: OperandSpec, op: Nodes.StorageOperand, fields: FieldValues, binary: Binary) {
        switch (spec.kind) {
            case "register":
            case "immediate":
                this.noSubfields(op);
                this.setField(fields, spec, this.evaluator.safeInteger(ctx, op.expr, rec.stmtNo));
                break;
            case "storage":
                this.setStorage(fields, spec, this.resolveStorage(ctx, rec, op));
                break;
            case "indexed": {
                const [index, storage] = this.resolveIndexed(ctx, rec, op);
                fields.x2 = index;
                this.setStorage(fields, spec, storage);
                break;
            }
            case "lengthStorage": {
                const [length, storage] = this.resolveLengthStorage(ctx, rec, op);
                fields.l1 = length;
                this.setStorage(fields, spec, storage);
                break;
            }
            case "relative":
                this.noSubfields(op);
                this.setField(fields, spec, this.resolveRelative(ctx, rec, op, binary));
                break;
        }
    }

    // D(B) or an address
    private resolveStorage(ctx: Context, rec: StatementRecord, op: Nodes.StorageOperand): StorageField {
        if (!op.subfields) {
            return this.implicitStorage(ctx, this.evaluator.safeAddress(ctx, op.expr, rec.stmtNo));
        }

        const [base, extra] = op.subfields;
        if (!base || extra || op.subfields.length != 1) {
            throw new AssemblerError("Expected D(B) operand", op);
        }
        return {
            base: this.evaluator.safeInteger(ctx, base, rec.stmtNo),
            displacement: this.evaluator.safeInteger(ctx, op.expr, rec.stmtNo),
        };
    }

    // D(X,B), D(,B), D(X), A(X) or an address
    private resolveIndexed(ctx: Context, rec: StatementRecord, op: Nodes.StorageOperand): [number, StorageField] {
        if (!op.subfields) {
            return [0, this.implicitStorage(ctx, this.evaluator.safeAddress(ctx, op.expr, rec.stmtNo))];
        }

        const [indexExpr, baseExpr] = op.subfields;
        const index = indexExpr ? this.evaluator.safeInteger(ctx, indexExpr, rec.stmtNo) : 0;
        if (op.subfields.length == 1) {
            return [index, this.displacementOrAddress(ctx, rec, op.expr)];
        } else if (!baseExpr) {
            throw new AssemblerError("Base register missing", op);
        }
        return [index, {
            base: this.evaluator.safeInteger(ctx, baseExpr, rec.stmtNo),
            displacement: this.evaluator.safeInteger(ctx, op.expr, rec.stmtNo),
        }];
    }

    // D(L,B), D(L), A(L) or an address with a length attribute
    private resolveLengthStorage(ctx: Context, rec: StatementRecord, op: Nodes.StorageOperand): [number, StorageField] {
        if (!op.subfields) {
            const addr = this.evaluator.safeAddress(ctx, op.expr, rec.stmtNo);
            if (addr.length === undefined) {
                throw new AssemblerError("Operand has no length, use D(L,B)", op);
            }
            return [addr.length, this.implicitStorage(ctx, addr)];
        }

        const [lengthExpr, baseExpr] = op.subfields;
        if (!lengthExpr) {
            throw new AssemblerError("Length missing", op);
        }
        const length = this.evaluator.safeInteger(ctx, lengthExpr, rec.stmtNo);
        if (op.subfields.length == 1) {
            return [length, this.displacementOrAddress(ctx, rec, op.expr)];
        } else if (!baseExpr) {
            throw new AssemblerError("Base register missing", op);
        }
        return [length, {
            base: this.evaluator.safeInteger(ctx, baseExpr, rec.stmtNo),
            displacement: this.evaluator.safeInteger(ctx, op.expr, rec.stmtNo),
        }];
    }

    // offset in halfwords from the instruction to the target
    private resolveRelative(ctx: Context, rec: StatementRecord, op: Nodes.StorageOperand, binary: Binary): number {
        const target = this.evaluator.safeAddress(ctx, op.expr, rec.stmtNo);
        if (!binary.loc) {
            throw new InternalError(`Instruction ${rec.stmtNo} has no location`);
        }

        const diff = subValues(target, this.arena.absolutize(binary.loc));
        if (isAddress(diff)) {
            throw new InternalError("Address difference is not an integer");
        } else if (diff % 2 != 0) {
            throw new AssemblerError("Relative target is not on a halfword boundary", op);
        }
        return diff / 2;
    }

    // plain numbers are displacements without base, addresses go through the base registers
    private displacementOrAddress(ctx: Context, rec: StatementRecord, expr: Nodes.Expression): StorageField {
        const val = this.evaluator.safeEval(ctx, expr, rec.stmtNo);
        if (!isAddress(val)) {
            return { base: 0, displacement: val };
        }
        return this.implicitStorage(ctx, val);
    }

    private implicitStorage(ctx: Context, addr: Address): StorageField {
        const res = ctx.baseMgr.resolve(addr, DisplacementBits);
        return { base: res.register, displacement: res.displacement };
    }

    private noSubfields(op: Nodes.StorageOperand) {
        if (op.subfields) {
            throw new AssemblerError("Unexpected storage operand", op);
        }
    }

    private setField(fields: FieldValues, spec: OperandSpec, value: number) {
        switch (spec.field) {
            case "r1":  fields.r1 = value; break;
            case "r2":  fields.r2 = value; break;
            case "r3":  fields.r3 = value; break;
            case "i2":  fields.i2 = value; break;
            case "s1":
            case "s2":
                throw new InternalError(`Field ${spec.field} is not a plain value`);
        }
    }

    private setStorage(fields: FieldValues, spec: OperandSpec, storage: StorageField) {
        switch (spec.field) {
            case "s1":  fields.s1 = storage; break;
            case "s2":  fields.s2 = storage; break;
            case "r1":
            case "r2":
            case "r3":
            case "i2":
                throw new InternalError(`Field ${spec.field} is not a storage field`);
        }
    }
}
