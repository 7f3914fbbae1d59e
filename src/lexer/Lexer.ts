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

import { replaceNonPrints } from "../utils/Strings.js";
import { Cursor, CursorExtent } from "./Cursor.js";
import { LexerError } from "./LexerError.js";
import * as Tokens from "./Token.js";
import { TokenType } from "./Token.js";

export class Lexer {
    private static SymbolRegex = /^[A-Z$#@_][A-Z0-9$#@_]*/i;
    private static IntRegex = /^[0-9]+/;
    private static MaxSymbolLength = 63;
    private inputName: string;
    private inputData: string;
    private lines: string[];
    private cursor: Cursor;
    private scanTable: Record<number, (data: string) => Tokens.Token> = [];

    public constructor(inputName: string, input: string) {
        this.inputName = inputName;
        this.inputData = input;
        this.lines = input.split("\n").map(l => l.replace(/\r$/, ""));

        this.cursor = {
            inputName: inputName,
            dataIdx: 0,
            colIdx: 0,
            lineIdx: 0,
        };

        this.fillScanTable();
    }

    public getInputName(): string {
        return this.inputName;
    }

    public getCursor(): Cursor {
        return this.cursor;
    }

    public getLine(lineIdx: number): string {
        return this.lines[lineIdx] ?? "";
    }

    public next(): Tokens.Token {
        const data = this.inputData;
        if (this.cursor.dataIdx >= data.length) {
            return {
                type: TokenType.EOF,
                extent: {
                    cursor: this.cursor,
                    width: 0,
                }
            };
        }

        // comment lines are recognized by their first column only
        const first = data[this.cursor.dataIdx];
        if (this.cursor.colIdx == 0 && first == "*") {
            return this.nextRemark();
        }

        return this.scanFromData(data);
    }

    public nextNonBlank(gotTok?: Tokens.Token): Tokens.Token {
        if (gotTok && gotTok.type != TokenType.Blank) {
            return gotTok;
        }

        while (true) {
            const next = this.next();
            if (next.type != TokenType.Blank) {
                return next;
            }
        }
    }

    public unget(tok: Tokens.Token) {
        if (tok.extent.cursor.inputName != this.inputName) {
            throw new LexerError("Can't unget across inputs", this.cursor);
        }
        this.cursor = tok.extent.cursor;
    }

    // everything up to the end of the line
    public nextRemark(): Tokens.RemarkToken {
        const startCursor = this.cursor;
        const data = this.inputData;

        let remark = "";
        while (this.cursor.dataIdx < data.length && !this.isLineBreak(data[this.cursor.dataIdx])) {
            remark += data[this.cursor.dataIdx];
            this.advanceCursor(1);
        }

        return {
            type: TokenType.Remark,
            remark: remark.replace(/\r$/, ""),
            extent: this.calcExtentFrom(startCursor),
        };
    }

    public ignoreCurrentLine() {
        const data = this.inputData;
        while (this.cursor.dataIdx < data.length) {
            const isBreak = this.isLineBreak(data[this.cursor.dataIdx]);
            this.advanceCursor(1);
            if (isBreak) {
                break;
            }
        }
    }

    private fillScanTable() {
        for (let c = 0; c < 256; c++) {
            const chr = String.fromCharCode(c);
            if (this.isLineBreak(chr)) {
                this.scanTable[c] = () => this.toNewLine();
            } else if (this.isBlank(chr)) {
                this.scanTable[c] = () => this.toBlank(chr);
            } else if (this.isSymbolStart(chr)) {
                this.scanTable[c] = this.scanSymbolOrAttribute.bind(this);
            } else if (chr >= "0" && chr <= "9") {
                this.scanTable[c] = this.scanInt.bind(this);
            } else if (chr == "'") {
                this.scanTable[c] = this.scanString.bind(this);
            }
        }
    }

    private scanFromData(data: string): Tokens.Token {
        const first = data[this.cursor.dataIdx];
        const handler = this.scanTable[first.charCodeAt(0)];

        if (handler) {
            return handler(data);
        } else {
            return this.scanChar(data);
        }
    }

    private toNewLine(): Tokens.EOLToken {
        const startCursor = this.cursor;
        this.advanceCursor(1);
        return {
            type: TokenType.EOL,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private toBlank(first: Tokens.BlankChr): Tokens.BlankToken {
        const startCursor = this.cursor;
        this.advanceCursor(1);
        return {
            type: TokenType.Blank,
            char: first,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanSymbolOrAttribute(data: string): Tokens.SymbolToken | Tokens.AttributeToken {
        const startCursor = this.cursor;
        const idx = startCursor.dataIdx;

        // L'NAME and M'NAME, but not C'..' or X'..'
        const attr = data[idx].toUpperCase();
        if ((attr == "L" || attr == "M") && data[idx + 1] == "'" && this.isSymbolStart(data[idx + 2] ?? "")) {
            this.advanceCursor(2);
            return {
                type: TokenType.Attribute,
                attribute: attr,
                extent: this.calcExtentFrom(startCursor),
            };
        }

        return this.scanSymbol(data);
    }

    private scanSymbol(data: string): Tokens.SymbolToken {
        const startCursor = this.cursor;
        const match = data.substring(startCursor.dataIdx).match(Lexer.SymbolRegex);
        if (!match) {
            throw new LexerError("Expected symbol", startCursor);
        }
        const symbol = match[0];
        if (symbol.length > Lexer.MaxSymbolLength) {
            throw new LexerError(`Symbol longer than ${Lexer.MaxSymbolLength} characters`, startCursor);
        }
        this.advanceCursor(symbol.length);

        return {
            type: TokenType.Symbol,
            name: symbol,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanInt(data: string): Tokens.IntegerToken {
        const startCursor = this.cursor;
        const match = data.substring(startCursor.dataIdx).match(Lexer.IntRegex);
        if (!match) {
            throw new LexerError("Expected integer", startCursor);
        }
        const int = match[0];
        this.advanceCursor(int.length);
        return {
            type: TokenType.Integer,
            value: int,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanString(data: string): Tokens.StringToken {
        const startCursor = this.cursor;
        this.advanceCursor(1); // opening quote

        let str = "";
        while (true) {
            const c = data[this.cursor.dataIdx];
            if (c === undefined || this.isLineBreak(c)) {
                throw new LexerError("Unterminated string", startCursor);
            }

            this.advanceCursor(1);
            if (c == "'") {
                // doubled quotes stand for a single quote
                if (data[this.cursor.dataIdx] == "'") {
                    str += "'";
                    this.advanceCursor(1);
                    continue;
                }
                break;
            }
            str += c;
        }

        return {
            type: TokenType.String,
            str: str,
            extent: this.calcExtentFrom(startCursor),
        };
    }

    private scanChar(data: string): Tokens.CharToken {
        const startCursor = this.cursor;
        const chr = data[startCursor.dataIdx];
        this.advanceCursor(1);
        if (this.isOperator(chr)) {
            return {
                type: TokenType.Char,
                char: chr,
                extent: this.calcExtentFrom(startCursor),
            };
        }

        throw new LexerError(`Unexpected character '${replaceNonPrints(chr)}'`, startCursor);
    }

    private advanceCursor(step: number) {
        const data = this.inputData;
        // make sure to create a new object so that tokens keep their start cursor
        const newCursor = { ...this.cursor };

        for (let i = 0; i < step; i++) {
            if (data[newCursor.dataIdx] == "\n") {
                newCursor.lineIdx++;
                newCursor.colIdx = 0;
            } else {
                newCursor.colIdx++;
            }
            newCursor.dataIdx++;
        }

        this.cursor = newCursor;
    }

    private isOperator(chr: string): chr is Tokens.OperatorChr {
        return Tokens.OperatorChars.includes(chr);
    }

    private isSymbolStart(chr: string): boolean {
        return /^[A-Z$#@_]$/i.test(chr);
    }

    private isLineBreak(chr: string): chr is Tokens.LineBreakChr {
        return chr == "\n";
    }

    private isBlank(chr: string): chr is Tokens.BlankChr {
        return chr == " " || chr == "\r" || chr == "\t" || chr == "\f";
    }

    private calcExtentFrom(start: Cursor): CursorExtent {
        const end = this.cursor;

        return {
            cursor: start,
            width: end.dataIdx - start.dataIdx,
        };
    }
}
