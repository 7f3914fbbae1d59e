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

import { calcExtent } from "../../lexer/Cursor.js";
import { Lexer } from "../../lexer/Lexer.js";
import * as Tokens from "../../lexer/Token.js";
import { TokenType } from "../../lexer/Token.js";
import { tokenToString } from "../../lexer/formatToken.js";
import { ParserError } from "../ParserError.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";

/**
 * Helpers shared by the statement, expression and data parsers.
 * Operand fields never contain blanks outside of quoted strings, so nothing
 * in here skips blanks.
 */
export class CommonParser {
    public constructor(private lexer: Lexer) {
    }

    public parseSymbol(gotTok?: Tokens.Token): Nodes.SymbolNode {
        const tok = gotTok ?? this.lexer.next();
        if (tok.type != TokenType.Symbol) {
            throw new ParserError(`Symbol expected, got ${tokenToString(tok)}`, tok);
        }
        return { type: NodeType.Symbol, name: tok.name, extent: tok.extent };
    }

    public parseInteger(tok: Tokens.IntegerToken): Nodes.Integer {
        return { type: NodeType.Integer, value: Number.parseInt(tok.value, 10), extent: tok.extent };
    }

    public parseSelfDefTerm(kindTok: Tokens.SymbolToken, str: Tokens.StringToken): Nodes.SelfDefTerm {
        const kind = kindTok.name.toUpperCase();
        if (kind != "X" && kind != "B" && kind != "C") {
            throw new ParserError(`Unknown self-defining term type '${kindTok.name}'`, kindTok);
        }

        return {
            type: NodeType.SelfDefTerm,
            kind: kind,
            text: str.str,
            extent: calcExtent(kindTok, str),
        };
    }

    public isChar(tok: Tokens.Token, chr: Tokens.OperatorChr): tok is Tokens.CharToken {
        return tok.type == TokenType.Char && tok.char == chr;
    }

    public expectChar(chr: Tokens.OperatorChr, gotTok?: Tokens.Token): Tokens.CharToken {
        const tok = gotTok ?? this.lexer.next();
        if (!this.isChar(tok, chr)) {
            throw new ParserError(`Expected '${chr}', got ${tokenToString(tok)}`, tok);
        }
        return tok;
    }

    /**
     * Parse a comma separated list, leaving the token behind the list unconsumed.
     */
    public parseList<T>(parseItem: (tok: Tokens.Token) => T, gotTok?: Tokens.Token): T[] {
        const items: T[] = [];
        let tok = gotTok ?? this.lexer.next();
        while (true) {
            items.push(parseItem(tok));
            const next = this.lexer.next();
            if (!this.isChar(next, ",")) {
                this.lexer.unget(next);
                break;
            }
            tok = this.lexer.next();
        }
        return items;
    }

    public isFieldEnd(tok: Tokens.Token): boolean {
        return tok.type == TokenType.Blank || tok.type == TokenType.EOL || tok.type == TokenType.EOF;
    }
}
