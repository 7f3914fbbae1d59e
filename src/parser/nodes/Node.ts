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

import { CursorExtent } from "../../lexer/Cursor.js";
import { CodeError } from "../../utils/CodeError.js";
import { DataOperand, NominalValue } from "./DataOperand.js";
import { Expression } from "./Expression.js";
import { Statement, StorageOperand } from "./Statement.js";

export * from "./DataOperand.js";
export * from "./Expression.js";
export * from "./Statement.js";

export enum NodeType {
    // Program
    Program,

    // Statements
    Comment, ListingControl,
    Start, Region, Csect, Dsect, Org,
    Using, Drop, Equ, Entry, End,
    DefineConstant, DefineStorage,
    Instruction, Ccw, Psw, Xmode,

    // Operands
    StorageOperand, DataOperand, QuotedValue, ExprList,

    // Expressions
    BinaryOp, UnaryOp, ParenExpr,
    Integer, SelfDefTerm, Symbol, AttributeRef, CurrentLocation,
}

export type Node =
    Program | Statement | StorageOperand | DataOperand | NominalValue | Expression;

export interface BaseNode {
    type: NodeType;
    extent: CursorExtent;
}

export interface Program extends BaseNode {
    type: NodeType.Program;
    inputName: string;
    stmts: Statement[];
    errors: CodeError[];
}
