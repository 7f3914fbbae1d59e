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

import { Expression } from "./Expression.js";
import { BaseNode, NodeType } from "./Node.js";

export type DataType = "C" | "X" | "B" | "F" | "H" | "D" | "P" | "Z" | "A" | "Y" | "S" | "AD" | "FD";

// [dup]type[Ln][nominal], e.g. 2CL8'AB', 0F, A(X,Y)
export interface DataOperand extends BaseNode {
    type: NodeType.DataOperand;
    duplication?: Expression;
    dataType: DataType;
    explicitLength?: number;
    nominal?: NominalValue;
}

export type NominalValue = QuotedValue | ExprList;

export interface QuotedValue extends BaseNode {
    type: NodeType.QuotedValue;
    text: string;
}

export interface ExprList extends BaseNode {
    type: NodeType.ExprList;
    exprs: Expression[];
}
