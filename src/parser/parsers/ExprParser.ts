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
import { CommonParser } from "./CommonParser.js";

export class ExprParser {
    public constructor(private lexer: Lexer, private commonParser: CommonParser) {
    }

    public parseExpr(gotTok?: Tokens.Token): Nodes.Expression {
        let lhs = this.parseTerm(gotTok);
        while (true) {
            const opTok = this.lexer.next();
            if (opTok.type != TokenType.Char || (opTok.char != "+" && opTok.char != "-")) {
                this.lexer.unget(opTok);
                return lhs;
            }
            const rhs = this.parseTerm();
            lhs = this.mkBinaryOp(lhs, opTok.char, rhs);
        }
    }

    // multiplicative level
    private parseTerm(gotTok?: Tokens.Token): Nodes.Expression {
        let lhs = this.parseUnary(gotTok);
        while (true) {
            const opTok = this.lexer.next();
            if (opTok.type != TokenType.Char || (opTok.char != "*" && opTok.char != "/")) {
                this.lexer.unget(opTok);
                return lhs;
            }
            const rhs = this.parseUnary();
            lhs = this.mkBinaryOp(lhs, opTok.char, rhs);
        }
    }

    private parseUnary(gotTok?: Tokens.Token): Nodes.Expression {
        const tok = gotTok ?? this.lexer.next();
        if (tok.type == TokenType.Char && (tok.char == "+" || tok.char == "-")) {
            const operand = this.parseUnary();
            return {
                type: NodeType.UnaryOp,
                operator: tok.char,
                operand: operand,
                extent: calcExtent(tok, operand),
            };
        }
        return this.parsePrimary(tok);
    }

    private parsePrimary(tok: Tokens.Token): Nodes.Expression {
        switch (tok.type) {
            case TokenType.Integer:
                return this.commonParser.parseInteger(tok);
            case TokenType.Symbol:
                return this.parseSymbolOrSelfDef(tok);
            case TokenType.Attribute:
                return this.parseAttributeRef(tok);
            case TokenType.Char:
                if (tok.char == "*") {
                    return { type: NodeType.CurrentLocation, extent: tok.extent };
                } else if (tok.char == "(") {
                    return this.parseParenExpr(tok);
                }
                break;
            case TokenType.String:
            case TokenType.Blank:
            case TokenType.Remark:
            case TokenType.EOL:
            case TokenType.EOF:
                break;
        }
        throw new ParserError(`Expression expected, got ${tokenToString(tok)}`, tok);
    }

    private parseSymbolOrSelfDef(tok: Tokens.SymbolToken): Nodes.Expression {
        const next = this.lexer.next();
        if (next.type == TokenType.String) {
            return this.commonParser.parseSelfDefTerm(tok, next);
        }
        this.lexer.unget(next);
        return this.commonParser.parseSymbol(tok);
    }

    private parseAttributeRef(tok: Tokens.AttributeToken): Nodes.AttributeRef {
        const symbol = this.commonParser.parseSymbol();
        return {
            type: NodeType.AttributeRef,
            attribute: tok.attribute,
            symbol: symbol,
            extent: calcExtent(tok, symbol),
        };
    }

    private parseParenExpr(open: Tokens.CharToken): Nodes.ParenExpr {
        const expr = this.parseExpr();
        const close = this.commonParser.expectChar(")");
        return {
            type: NodeType.ParenExpr,
            expr: expr,
            extent: calcExtent(open, close),
        };
    }

    private mkBinaryOp(lhs: Nodes.Expression, operator: Tokens.BinaryOpChr, rhs: Nodes.Expression): Nodes.BinaryOp {
        return {
            type: NodeType.BinaryOp,
            lhs: lhs,
            operator: operator,
            rhs: rhs,
            extent: calcExtent(lhs, rhs),
        };
    }
}
