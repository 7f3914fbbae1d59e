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

import { isAddress, Value } from "../../image/Address.js";
import { Arena } from "../../image/Arena.js";
import { Binary } from "../../image/Binary.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { SubComponents } from "../Assembler.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { StatementRecord } from "../Statement.js";
import { SymbolType } from "../SymbolData.js";
import { SymbolTable } from "../SymbolTable.js";
import { deferred, Deferred, ExprEvaluator, isDeferred } from "../util/ExprEvaluator.js";

// leftmost symbol of an expression, it gives an equate its default length
export function firstSymbol(expr: Nodes.Expression): Nodes.SymbolNode | undefined {
    switch (expr.type) {
        case NodeType.BinaryOp:         return firstSymbol(expr.lhs) ?? firstSymbol(expr.rhs);
        case NodeType.UnaryOp:          return firstSymbol(expr.operand);
        case NodeType.ParenExpr:        return firstSymbol(expr.expr);
        case NodeType.Symbol:           return expr;
        case NodeType.Integer:
        case NodeType.SelfDefTerm:
        case NodeType.AttributeRef:
        case NodeType.CurrentLocation:
            return undefined;
    }
}

/**
 * Assembler for labels, equates and the entry point.
 */
export class SymbolAssembler {
    private arena: Arena;
    private syms: SymbolTable;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.arena = components.arena;
        this.syms = components.symbols;
        this.evaluator = components.evaluator;
    }

    public defineLabel(rec: StatementRecord, binary: Binary, length: number | undefined) {
        const label = rec.node.label;
        if (!label) {
            return;
        }
        this.syms.define(label.name, { type: SymbolType.Label, binaryId: binary.id }, { L: length, S: 0, I: 0, T: "A" }, rec.stmtNo);
    }

    public defineEquate(rec: StatementRecord, stmt: Nodes.EquStatement) {
        if (!stmt.label) {
            throw new AssemblerError("EQU needs a label", stmt);
        }
        this.syms.define(stmt.label.name, { type: SymbolType.Equate }, { S: 0, I: 0, T: "L" }, rec.stmtNo);
    }

    /**
     * Assign the value of an equate. The length comes from the second operand,
     * else from the first symbol in the value, else it is 1.
     */
    public resolveEqu(ctx: Context, rec: StatementRecord, stmt: Nodes.EquStatement): Deferred | undefined {
        const value = this.evaluator.tryEval(ctx, stmt.value, rec.stmtNo);
        if (isDeferred(value)) {
            return value;
        }

        let length: number;
        if (stmt.length) {
            const lenVal = this.evaluator.tryEval(ctx, stmt.length, rec.stmtNo);
            if (isDeferred(lenVal)) {
                return lenVal;
            } else if (isAddress(lenVal) || lenVal < 0) {
                throw new AssemblerError("EQU length must be a non-negative integer", stmt.length);
            }
            length = lenVal;
        } else {
            const first = firstSymbol(stmt.value);
            const firstLen = first ? this.syms.lookup(first.name).attributes.L : 1;
            if (firstLen === undefined) {
                // lengths of sections are only final after allocation
                if (!ctx.bound) {
                    return deferred(`length of ${first?.name} not known yet`);
                }
                length = 1;
            } else {
                length = firstLen;
            }
        }

        this.assign(stmt, value, length);
        return undefined;
    }

    // control section addresses in equates become memory addresses with their section
    public bindEqu(stmt: Nodes.EquStatement) {
        const sym = this.lookupEquate(stmt);
        if (sym.value.type == SymbolType.Equate && sym.value.value !== undefined && isAddress(sym.value.value)) {
            sym.value = { type: SymbolType.Equate, value: this.arena.absolutize(sym.value.value) };
        }
    }

    public handleEntry(ctx: Context, rec: StatementRecord, stmt: Nodes.EntryStatement) {
        if (ctx.entry) {
            throw new AssemblerError("Entry point already set", stmt);
        }
        const address = this.evaluator.safeAbsolute(ctx, stmt.target, rec.stmtNo);
        ctx.entry = { address, source: "ENTRY" };
    }

    // END overrides ENTRY
    public handleEnd(ctx: Context, rec: StatementRecord, stmt: Nodes.EndStatement) {
        if (!stmt.target) {
            return;
        }
        const address = this.evaluator.safeAbsolute(ctx, stmt.target, rec.stmtNo);
        ctx.entry = { address, source: "END" };
    }

    private assign(stmt: Nodes.EquStatement, value: Value, length: number) {
        const sym = this.lookupEquate(stmt);
        sym.value = { type: SymbolType.Equate, value };
        sym.attributes.L = length;
        sym.attributes.T = isAddress(value) ? "A" : "L";
    }

    private lookupEquate(stmt: Nodes.EquStatement) {
        if (!stmt.label) {
            throw new AssemblerError("EQU needs a label", stmt);
        }
        return this.syms.lookup(stmt.label.name);
    }
}
