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

import { BinaryOpChr, UnaryOpChr } from "../../lexer/Token.js";
import { BaseNode, NodeType } from "./Node.js";

export type Expression = BinaryOp | UnaryOp | ParenExpr | Term;
export type Term = Integer | SelfDefTerm | SymbolNode | AttributeRef | CurrentLocation;

// A+B*C, left-associative with usual precedence
export interface BinaryOp extends BaseNode {
    type: NodeType.BinaryOp;
    lhs: Expression;
    operator: BinaryOpChr;
    rhs: Expression;
}

// -A
export interface UnaryOp extends BaseNode {
    type: NodeType.UnaryOp;
    operator: UnaryOpChr;
    operand: Expression;
}

// (A+B)
export interface ParenExpr extends BaseNode {
    type: NodeType.ParenExpr;
    expr: Expression;
}

export interface Integer extends BaseNode {
    type: NodeType.Integer;
    value: number;
}

// X'1F', B'0101', C'AB'
export interface SelfDefTerm extends BaseNode {
    type: NodeType.SelfDefTerm;
    kind: "X" | "B" | "C";
    text: string;
}

export interface SymbolNode extends BaseNode {
    type: NodeType.Symbol;
    name: string;
}

// L'SYM, M'SYM
export interface AttributeRef extends BaseNode {
    type: NodeType.AttributeRef;
    attribute: "L" | "M";
    symbol: SymbolNode;
}

// *
export interface CurrentLocation extends BaseNode {
    type: NodeType.CurrentLocation;
}
