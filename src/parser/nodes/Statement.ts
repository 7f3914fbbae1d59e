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

import { PswFormat } from "../../isa/PswBuilder.js";
import { CcwFormat } from "../../isa/Xmode.js";
import { DataOperand } from "./DataOperand.js";
import { Expression, SymbolNode } from "./Expression.js";
import { BaseNode, NodeType } from "./Node.js";

export type Statement =
    CommentStatement | ListingControlStatement |
    StartStatement | RegionStatement | CsectStatement | DsectStatement | OrgStatement |
    UsingStatement | DropStatement | EquStatement | EntryStatement | EndStatement |
    DefineConstantStatement | DefineStorageStatement |
    InstructionStatement | CcwStatement | PswStatement | XmodeStatement;

export interface BaseStatement extends BaseNode {
    label?: SymbolNode;
    operation: string;

    // source line for the listing
    source: string;
}

export interface CommentStatement extends BaseStatement {
    type: NodeType.Comment;
}

// PRINT, EJECT, SPACE, TITLE
export interface ListingControlStatement extends BaseStatement {
    type: NodeType.ListingControl;
}

// START [address][,region]
export interface StartStatement extends BaseStatement {
    type: NodeType.Start;
    address?: Expression;
    region?: SymbolNode;
}

// REGION [address]
export interface RegionStatement extends BaseStatement {
    type: NodeType.Region;
    address?: Expression;
}

export interface CsectStatement extends BaseStatement {
    type: NodeType.Csect;
}

export interface DsectStatement extends BaseStatement {
    type: NodeType.Dsect;
}

// ORG [target]
export interface OrgStatement extends BaseStatement {
    type: NodeType.Org;
    target?: Expression;
}

// USING anchor,reg[,reg...]
export interface UsingStatement extends BaseStatement {
    type: NodeType.Using;
    anchor: Expression;
    registers: Expression[];
}

// DROP [reg,...]
export interface DropStatement extends BaseStatement {
    type: NodeType.Drop;
    registers: Expression[];
}

// EQU value[,length]
export interface EquStatement extends BaseStatement {
    type: NodeType.Equ;
    value: Expression;
    length?: Expression;
}

export interface EntryStatement extends BaseStatement {
    type: NodeType.Entry;
    target: Expression;
}

export interface EndStatement extends BaseStatement {
    type: NodeType.End;
    target?: Expression;
}

export interface DefineConstantStatement extends BaseStatement {
    type: NodeType.DefineConstant;
    operands: DataOperand[];
}

export interface DefineStorageStatement extends BaseStatement {
    type: NodeType.DefineStorage;
    operands: DataOperand[];
}

// disp, disp(x), disp(x,b), disp(,b), or a plain expression
export interface StorageOperand extends BaseNode {
    type: NodeType.StorageOperand;
    expr: Expression;
    subfields?: (Expression | undefined)[];
}

export interface InstructionStatement extends BaseStatement {
    type: NodeType.Instruction;
    mnemonic: string;
    operands: StorageOperand[];
}

// CCW0/CCW1 command,address,flags,count, plain CCW follows XMODE
export interface CcwStatement extends BaseStatement {
    type: NodeType.Ccw;
    format?: CcwFormat;
    command: Expression;
    address: Expression;
    flags: Expression;
    count: Expression;
}

// PSWxx system,key,mode,program,address[,amode], plain PSW follows XMODE
export interface PswStatement extends BaseStatement {
    type: NodeType.Psw;
    format?: PswFormat;
    system: Expression;
    key: Expression;
    mode: Expression;
    program: Expression;
    address: Expression;
    amode?: Expression;
}

// XMODE PSW|CCW,setting
export interface XmodeStatement extends BaseStatement {
    type: NodeType.Xmode;
    mode: string;
    setting: string;
}
