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

import { absolute, Address, AddressError, addValues, divValues, formatValue, isAddress, mulValues, subValues, toInteger, Value, withLength } from "../../image/Address.js";
import { Arena } from "../../image/Arena.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import * as CharSets from "../../utils/CharSets.js";
import { parseIntSafe } from "../../utils/Strings.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { SymbolData, SymbolType } from "../SymbolData.js";
import { SymbolTable } from "../SymbolTable.js";

// an expression that can't be evaluated yet but might be in a later phase
export interface Deferred {
    kind: "deferred";
    reason: string;
}

export type EvalResult = Value | Deferred;

export function isDeferred(res: EvalResult): res is Deferred {
    return typeof res != "number" && res.kind == "deferred";
}

export function deferred(reason: string): Deferred {
    return { kind: "deferred", reason };
}

export class EvaluationError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = EvaluationError.name;
    }
}

/**
 * Class to evaluate expressions.
 * Evaluating a symbol records a reference from the evaluating statement.
 *
 * An expression can refer to symbols whose location is not known yet. tryEval
 * returns a Deferred result in that case while safeEval throws.
 */
export class ExprEvaluator {
    public constructor(private syms: SymbolTable, private arena: Arena) {
    }

    public safeEval(ctx: Context, expr: Nodes.Expression, stmtNo: number): Value {
        const val = this.tryEval(ctx, expr, stmtNo);
        if (isDeferred(val)) {
            throw new AssemblerError(`Undefined expression: ${val.reason}`, expr);
        }
        return val;
    }

    public safeInteger(ctx: Context, expr: Nodes.Expression, stmtNo: number): number {
        return toInteger(this.safeEval(ctx, expr, stmtNo));
    }

    // address of the expression, plain integers are taken as absolute addresses
    public safeAddress(ctx: Context, expr: Nodes.Expression, stmtNo: number): Address {
        const val = this.safeEval(ctx, expr, stmtNo);
        return isAddress(val) ? val : absolute(val);
    }

    // memory address or plain number, dummy section offsets count as numbers
    public safeAbsolute(ctx: Context, expr: Nodes.Expression, stmtNo: number): number {
        const val = this.safeEval(ctx, expr, stmtNo);
        if (isAddress(val) && val.kind == "absolute") {
            return val.value;
        } else if (isAddress(val) && !val.dummy) {
            throw new AssemblerError(`Address ${formatValue(val)} is not bound to memory`, expr);
        }
        return toInteger(val);
    }

    public tryEval(ctx: Context, expr: Nodes.Expression, stmtNo: number): EvalResult {
        try {
            return this.evalExpr(ctx, expr, stmtNo);
        } catch (e) {
            // addresses of different control sections can be combined once they are bound
            if (e instanceof AddressError && !ctx.bound) {
                return deferred(e.message);
            }
            throw e;
        }
    }

    private evalExpr(ctx: Context, expr: Nodes.Expression, stmtNo: number): EvalResult {
        switch (expr.type) {
            case NodeType.BinaryOp:         return this.evalBinOp(ctx, expr, stmtNo);
            case NodeType.UnaryOp:          return this.evalUnaryOp(ctx, expr, stmtNo);
            case NodeType.ParenExpr:        return this.evalExpr(ctx, expr.expr, stmtNo);
            case NodeType.Integer:          return expr.value;
            case NodeType.SelfDefTerm:      return this.evalSelfDefTerm(expr);
            case NodeType.Symbol:           return this.evalSymbol(expr, stmtNo);
            case NodeType.AttributeRef:     return this.evalAttribute(ctx, expr, stmtNo);
            case NodeType.CurrentLocation:  return this.evalLocation(ctx);
        }
    }

    private evalBinOp(ctx: Context, binOp: Nodes.BinaryOp, stmtNo: number): EvalResult {
        const lhs = this.evalExpr(ctx, binOp.lhs, stmtNo);
        const rhs = this.evalExpr(ctx, binOp.rhs, stmtNo);
        if (isDeferred(lhs)) {
            return lhs;
        } else if (isDeferred(rhs)) {
            return rhs;
        }

        switch (binOp.operator) {
            case "+":   return addValues(lhs, rhs);
            case "-":   return subValues(lhs, rhs);
            case "*":   return mulValues(lhs, rhs);
            case "/":   return divValues(lhs, rhs);
        }
    }

    private evalUnaryOp(ctx: Context, unOp: Nodes.UnaryOp, stmtNo: number): EvalResult {
        const val = this.evalExpr(ctx, unOp.operand, stmtNo);
        if (isDeferred(val)) {
            return val;
        }

        switch (unOp.operator) {
            case "+":   return val;
            case "-":   return -toInteger(val);
        }
    }

    private evalSelfDefTerm(term: Nodes.SelfDefTerm): number {
        switch (term.kind) {
            case "X":
                return ExprEvaluator.checkWidth(term, parseIntSafe(term.text, 16), term.text.length * 4);
            case "B":
                return ExprEvaluator.checkWidth(term, parseIntSafe(term.text, 2), term.text.length);
            case "C": {
                const bytes = CharSets.asciiStringToEbcdic(term.text);
                if (bytes.length == 0 || bytes.length > 4) {
                    throw new EvaluationError(`Character term C'${term.text}' needs 1 to 4 characters`);
                }
                return bytes.reduce((acc, b) => acc * 256 + b, 0);
            }
        }
    }

    private static checkWidth(term: Nodes.SelfDefTerm, value: number, bits: number): number {
        if (bits == 0 || value >= 2 ** 32) {
            throw new EvaluationError(`Self-defining term ${term.kind}'${term.text}' must have 1 to 32 bits`);
        }
        return value;
    }

    private evalLocation(ctx: Context): EvalResult {
        const cur = ctx.location.current();
        if (!cur) {
            return deferred("location counter not established");
        }
        return this.arena.absolutize(cur);
    }

    private evalSymbol(node: Nodes.SymbolNode, stmtNo: number): EvalResult {
        // every symbol is defined during parsing, so a missing one is missing for good
        const sym = this.syms.lookup(node.name);
        this.syms.reference(node.name, stmtNo);

        const value = this.symbolValue(sym);
        if (isDeferred(value) || !isAddress(value)) {
            return value;
        }
        return withLength(this.arena.absolutize(value), sym.attributes.L);
    }

    private symbolValue(sym: SymbolData): EvalResult {
        const val = sym.value;
        switch (val.type) {
            case SymbolType.Section:
                return this.arena.section(val.sectionId).loc;
            case SymbolType.Region: {
                const region = this.arena.region(val.regionId);
                if (!region.loc) {
                    return deferred(`${region.describe()} not positioned yet`);
                }
                return region.loc;
            }
            case SymbolType.Image:
                throw new EvaluationError(`Image ${sym.name} has no address`);
            case SymbolType.Label: {
                const loc = this.arena.binary(val.binaryId).loc;
                if (!loc) {
                    return deferred(`location of ${sym.name} not assigned yet`);
                }
                return loc;
            }
            case SymbolType.Equate:
                if (val.value === undefined) {
                    return deferred(`${sym.name} not resolved yet`);
                }
                return val.value;
        }
    }

    private evalAttribute(ctx: Context, ref: Nodes.AttributeRef, stmtNo: number): EvalResult {
        const sym = this.syms.lookup(ref.symbol.name);
        this.syms.reference(ref.symbol.name, stmtNo);

        switch (ref.attribute) {
            case "L":
                if (sym.attributes.L === undefined) {
                    return deferred(`length of ${sym.name} not known yet`);
                }
                return sym.attributes.L;
            case "M":
                if (sym.attributes.M !== undefined) {
                    return sym.attributes.M;
                } else if (ctx.bound) {
                    throw new EvaluationError(`${sym.name} has no position in the image`);
                }
                return deferred(`image position of ${sym.name} not known before bind`);
        }
    }
}
