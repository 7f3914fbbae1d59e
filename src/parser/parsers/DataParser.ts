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

import { calcExtent, HasExtent } from "../../lexer/Cursor.js";
import { Lexer } from "../../lexer/Lexer.js";
import * as Tokens from "../../lexer/Token.js";
import { TokenType } from "../../lexer/Token.js";
import { tokenToString } from "../../lexer/formatToken.js";
import { ParserError } from "../ParserError.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";
import { CommonParser } from "./CommonParser.js";
import { ExprParser } from "./ExprParser.js";

export class DataParser {
    private static TypeRegex = /^(AD|FD|[CXBFHDPZAYS])(?:L([0-9]+))?$/i;

    public constructor(private lexer: Lexer, private commonParser: CommonParser, private exprParser: ExprParser) {
    }

    // operand list of DC and DS
    public parseDataOperands(gotTok: Tokens.Token): Nodes.DataOperand[] {
        return this.commonParser.parseList(tok => this.parseDataOperand(tok), gotTok);
    }

    private parseDataOperand(first: Tokens.Token): Nodes.DataOperand {
        let tok = first;
        let duplication: Nodes.Expression | undefined;
        if (tok.type == TokenType.Integer) {
            duplication = this.commonParser.parseInteger(tok);
            tok = this.lexer.next();
        } else if (this.commonParser.isChar(tok, "(")) {
            duplication = this.exprParser.parseExpr(tok);
            tok = this.lexer.next();
        }

        if (tok.type != TokenType.Symbol) {
            throw new ParserError(`Data type expected, got ${tokenToString(tok)}`, tok);
        }

        const match = tok.name.match(DataParser.TypeRegex);
        if (!match) {
            throw new ParserError(`Unsupported data type '${tok.name}'`, tok);
        }
        const dataType = this.toDataType(match[1].toUpperCase(), tok);
        const explicitLength = match[2] !== undefined ? Number.parseInt(match[2], 10) : undefined;
        if (explicitLength === 0) {
            throw new ParserError("Explicit length must not be zero", tok);
        }

        const nominal = this.parseNominal();
        const last: HasExtent = nominal ?? tok;

        return {
            type: NodeType.DataOperand,
            duplication: duplication,
            dataType: dataType,
            explicitLength: explicitLength,
            nominal: nominal,
            extent: calcExtent(first, last),
        };
    }

    private parseNominal(): Nodes.NominalValue | undefined {
        const tok = this.lexer.next();
        if (tok.type == TokenType.String) {
            return {
                type: NodeType.QuotedValue,
                text: tok.str,
                extent: tok.extent,
            };
        } else if (this.commonParser.isChar(tok, "(")) {
            const exprs = this.commonParser.parseList(t => this.exprParser.parseExpr(t));
            const close = this.commonParser.expectChar(")");
            return {
                type: NodeType.ExprList,
                exprs: exprs,
                extent: calcExtent(tok, close),
            };
        }

        this.lexer.unget(tok);
        return undefined;
    }

    private toDataType(name: string, tok: Tokens.SymbolToken): Nodes.DataType {
        switch (name) {
            case "C":
            case "X":
            case "B":
            case "F":
            case "H":
            case "D":
            case "P":
            case "Z":
            case "A":
            case "Y":
            case "S":
            case "AD":
            case "FD":
                return name;
        }
        throw new ParserError(`Unsupported data type '${name}'`, tok);
    }
}
