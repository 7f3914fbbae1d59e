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

import { CursorExtent } from "./Cursor.js";

export type OperatorChr = BinaryOpChr | ParenChr | "," | "=";
export type ParenChr = "(" | ")";
export type BinaryOpChr = "+" | "-" | "*" | "/";
export type UnaryOpChr = "+" | "-";
export type AttributeChr = "L" | "M";

export type LineBreakChr = "\n";
export type BlankChr = " " | "\r" | "\t" | "\f";

export const OperatorChars = [
    ",", "=",
    "(", ")",
    "+", "-", "*", "/",
];

export type Token =
    BlankToken | EOLToken | EOFToken |
    SymbolToken | IntegerToken | CharToken | StringToken |
    AttributeToken | RemarkToken;

export enum TokenType {
    Blank, EOL, EOF,
    Symbol, Integer, Char, String,
    Attribute, Remark,
}

export interface BaseToken {
    type: TokenType;
    extent: CursorExtent;
}

export interface BlankToken extends BaseToken {
    type: TokenType.Blank;
    char: BlankChr;
}

export interface EOLToken extends BaseToken {
    type: TokenType.EOL;
}

export interface EOFToken extends BaseToken {
    type: TokenType.EOF;
}

export interface SymbolToken extends BaseToken {
    type: TokenType.Symbol;
    name: string;
}

export interface IntegerToken extends BaseToken {
    type: TokenType.Integer;
    value: string;
}

export interface CharToken extends BaseToken {
    type: TokenType.Char;
    char: OperatorChr;
}

// 'text' with doubled quotes already collapsed
export interface StringToken extends BaseToken {
    type: TokenType.String;
    str: string;
}

// L' and M' in front of a symbol
export interface AttributeToken extends BaseToken {
    type: TokenType.Attribute;
    attribute: AttributeChr;
}

// comment lines and the remarks field behind the operands
export interface RemarkToken extends BaseToken {
    type: TokenType.Remark;
    remark: string;
}
