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
import { PswFormat, PswFormats } from "../../isa/PswBuilder.js";
import { CcwFormat } from "../../isa/Xmode.js";
import { ParserOptions } from "../Parser.js";
import { ParserError } from "../ParserError.js";
import * as Nodes from "../nodes/Node.js";
import { NodeType } from "../nodes/Node.js";
import { CommonParser } from "./CommonParser.js";
import { DataParser } from "./DataParser.js";
import { ExprParser } from "./ExprParser.js";

// label and operation field, shared by all statements
interface StatementHead {
    label?: Nodes.SymbolNode;
    operation: string;
    opTok: Tokens.SymbolToken;
    source: string;
    first: HasExtent;
}

type OperandParser = (head: StatementHead, operands: Tokens.Token | undefined) => Nodes.Statement;

export class StatementParser {
    public static readonly SupportedDirectives = [
        "START", "REGION", "CSECT", "DSECT", "ORG",
        "USING", "DROP", "EQU", "ENTRY", "END",
        "DC", "DS", "CCW", "CCW0", "CCW1",
        "PSW", ...PswFormats, "XMODE",
        "PRINT", "EJECT", "SPACE", "TITLE",
    ];

    private commonParser: CommonParser;
    private exprParser: ExprParser;
    private dataParser: DataParser;
    private directives = new Map<string, OperandParser>();

    public constructor(private opts: ParserOptions, private lexer: Lexer) {
        this.commonParser = new CommonParser(this.lexer);
        this.exprParser = new ExprParser(this.lexer, this.commonParser);
        this.dataParser = new DataParser(this.lexer, this.commonParser, this.exprParser);
        this.registerDirectives();
    }

    private registerDirectives() {
        const listing: OperandParser = head => this.finishBare({ type: NodeType.ListingControl, ...this.headFields(head) });

        this.directives.set("START", this.parseStart.bind(this));
        this.directives.set("REGION", this.parseRegion.bind(this));
        this.directives.set("CSECT", head => this.finishBare({ type: NodeType.Csect, ...this.headFields(head) }));
        this.directives.set("DSECT", head => this.finishBare({ type: NodeType.Dsect, ...this.headFields(head) }));
        this.directives.set("ORG", this.parseOrg.bind(this));
        this.directives.set("USING", this.parseUsing.bind(this));
        this.directives.set("DROP", this.parseDrop.bind(this));
        this.directives.set("EQU", this.parseEqu.bind(this));
        this.directives.set("ENTRY", this.parseEntry.bind(this));
        this.directives.set("END", this.parseEnd.bind(this));
        this.directives.set("DC", this.parseDefineConstant.bind(this));
        this.directives.set("DS", this.parseDefineStorage.bind(this));
        this.directives.set("CCW", (head, ops) => this.parseCcw(head, ops, undefined));
        this.directives.set("CCW0", (head, ops) => this.parseCcw(head, ops, 0));
        this.directives.set("CCW1", (head, ops) => this.parseCcw(head, ops, 1));
        this.directives.set("PSW", (head, ops) => this.parsePsw(head, ops, undefined));
        for (const format of PswFormats) {
            this.directives.set(format, (head, ops) => this.parsePsw(head, ops, format));
        }
        this.directives.set("XMODE", this.parseXmode.bind(this));
        this.directives.set("PRINT", listing);
        this.directives.set("EJECT", listing);
        this.directives.set("SPACE", listing);
        this.directives.set("TITLE", listing);
    }

    /**
     * Parse the statement on the current line.
     * @returns the statement or undefined at the end of the input
     */
    public parseStatement(): Nodes.Statement | undefined {
        const first = this.lexer.next();
        if (first.type == TokenType.EOF) {
            return undefined;
        }

        const source = this.lexer.getLine(first.extent.cursor.lineIdx);
        if (first.type == TokenType.Remark) {
            this.finishLine();
            return this.mkComment(first, source);
        } else if (first.type == TokenType.EOL) {
            return this.mkComment(first, source);
        }

        // a symbol in the first column is a label
        let label: Nodes.SymbolNode | undefined;
        let tok: Tokens.Token = first;
        if (first.type == TokenType.Symbol) {
            label = this.commonParser.parseSymbol(first);
            tok = this.lexer.next();
            if (tok.type != TokenType.Blank) {
                throw new ParserError(`Blank expected after label, got ${tokenToString(tok)}`, tok);
            }
        }

        tok = this.lexer.nextNonBlank(tok);
        if (tok.type == TokenType.EOL || tok.type == TokenType.EOF) {
            if (label) {
                throw new ParserError("Operation expected", tok);
            }
            this.lexer.unget(tok);
            this.finishLine();
            return this.mkComment(first, source);
        } else if (tok.type != TokenType.Symbol) {
            throw new ParserError(`Operation expected, got ${tokenToString(tok)}`, tok);
        }

        const head: StatementHead = {
            label: label,
            operation: tok.name.toUpperCase(),
            opTok: tok,
            source: source,
            first: first,
        };

        const operands = this.nextOperandField();
        const parse = this.directives.get(head.operation) ?? this.parseInstruction.bind(this);
        return parse(head, operands);
    }

    private nextOperandField(): Tokens.Token | undefined {
        const next = this.lexer.next();
        if (next.type == TokenType.EOL || next.type == TokenType.EOF) {
            this.lexer.unget(next);
            return undefined;
        } else if (next.type != TokenType.Blank) {
            throw new ParserError(`Blank expected after operation, got ${tokenToString(next)}`, next);
        }

        const operand = this.lexer.nextNonBlank(next);
        if (operand.type == TokenType.EOL || operand.type == TokenType.EOF) {
            this.lexer.unget(operand);
            return undefined;
        }
        return operand;
    }

    private parseStart(head: StatementHead, operands: Tokens.Token | undefined): Nodes.StartStatement {
        let address: Nodes.Expression | undefined;
        let region: Nodes.SymbolNode | undefined;
        if (operands) {
            let tok = operands;
            if (!this.commonParser.isChar(tok, ",")) {
                address = this.exprParser.parseExpr(tok);
                tok = this.lexer.next();
            }
            if (this.commonParser.isChar(tok, ",")) {
                region = this.commonParser.parseSymbol();
            } else {
                this.lexer.unget(tok);
            }
        }
        return this.finishOperands({ type: NodeType.Start, ...this.headFields(head), address, region });
    }

    private parseRegion(head: StatementHead, operands: Tokens.Token | undefined): Nodes.RegionStatement {
        const address = operands ? this.exprParser.parseExpr(operands) : undefined;
        return this.finishOperands({ type: NodeType.Region, ...this.headFields(head), address });
    }

    private parseOrg(head: StatementHead, operands: Tokens.Token | undefined): Nodes.OrgStatement {
        const target = operands ? this.exprParser.parseExpr(operands) : undefined;
        return this.finishOperands({ type: NodeType.Org, ...this.headFields(head), target });
    }

    private parseUsing(head: StatementHead, operands: Tokens.Token | undefined): Nodes.UsingStatement {
        const exprs = this.commonParser.parseList(tok => this.exprParser.parseExpr(tok), this.requireOperands(head, operands));
        const [anchor, ...registers] = exprs;
        if (registers.length == 0) {
            throw new ParserError("USING needs an anchor and at least one register", head.opTok);
        }
        return this.finishOperands({ type: NodeType.Using, ...this.headFields(head), anchor, registers });
    }

    private parseDrop(head: StatementHead, operands: Tokens.Token | undefined): Nodes.DropStatement {
        const registers = operands ? this.commonParser.parseList(tok => this.exprParser.parseExpr(tok), operands) : [];
        return this.finishOperands({ type: NodeType.Drop, ...this.headFields(head), registers });
    }

    private parseEqu(head: StatementHead, operands: Tokens.Token | undefined): Nodes.EquStatement {
        const exprs = this.commonParser.parseList(tok => this.exprParser.parseExpr(tok), this.requireOperands(head, operands));
        if (!head.label) {
            throw new ParserError("EQU needs a label", head.opTok);
        } else if (exprs.length > 2) {
            throw new ParserError("EQU takes a value and an optional length", exprs[2]);
        }
        const [value, length] = exprs;
        return this.finishOperands({ type: NodeType.Equ, ...this.headFields(head), value, length });
    }

    private parseEntry(head: StatementHead, operands: Tokens.Token | undefined): Nodes.EntryStatement {
        const target = this.exprParser.parseExpr(this.requireOperands(head, operands));
        return this.finishOperands({ type: NodeType.Entry, ...this.headFields(head), target });
    }

    private parseEnd(head: StatementHead, operands: Tokens.Token | undefined): Nodes.EndStatement {
        const target = operands ? this.exprParser.parseExpr(operands) : undefined;
        return this.finishOperands({ type: NodeType.End, ...this.headFields(head), target });
    }

    private parseDefineConstant(head: StatementHead, operands: Tokens.Token | undefined): Nodes.DefineConstantStatement {
        const dataOperands = this.dataParser.parseDataOperands(this.requireOperands(head, operands));
        for (const op of dataOperands) {
            if (!op.nominal) {
                throw new ParserError("DC operand without value", op);
            }
        }
        return this.finishOperands({ type: NodeType.DefineConstant, ...this.headFields(head), operands: dataOperands });
    }

    private parseDefineStorage(head: StatementHead, operands: Tokens.Token | undefined): Nodes.DefineStorageStatement {
        const dataOperands = this.dataParser.parseDataOperands(this.requireOperands(head, operands));
        return this.finishOperands({ type: NodeType.DefineStorage, ...this.headFields(head), operands: dataOperands });
    }

    private parseCcw(head: StatementHead, operands: Tokens.Token | undefined, format: CcwFormat | undefined): Nodes.CcwStatement {
        const exprs = this.commonParser.parseList(tok => this.exprParser.parseExpr(tok), this.requireOperands(head, operands));
        if (exprs.length != 4) {
            throw new ParserError("CCW needs command, address, flags and count", head.opTok);
        }
        const [command, address, flags, count] = exprs;
        return this.finishOperands({ type: NodeType.Ccw, ...this.headFields(head), format, command, address, flags, count });
    }

    private parsePsw(head: StatementHead, operands: Tokens.Token | undefined, format: PswFormat | undefined): Nodes.PswStatement {
        const exprs = this.commonParser.parseList(tok => this.exprParser.parseExpr(tok), this.requireOperands(head, operands));
        if (exprs.length < 5 || exprs.length > 6) {
            throw new ParserError(`${head.operation} needs system, key, mode, program, address and an optional amode`, head.opTok);
        }
        const [system, key, mode, program, address, amode] = exprs;
        return this.finishOperands({ type: NodeType.Psw, ...this.headFields(head), format, system, key, mode, program, address, amode });
    }

    private parseXmode(head: StatementHead, operands: Tokens.Token | undefined): Nodes.XmodeStatement {
        const values = this.commonParser.parseList(tok => this.parseXmodeValue(tok), this.requireOperands(head, operands));
        if (values.length != 2) {
            throw new ParserError(`XMODE needs a mode and a setting, got ${values.length} operands`, head.opTok);
        }
        const [mode, setting] = values;
        return this.finishOperands({ type: NodeType.Xmode, ...this.headFields(head), mode, setting });
    }

    private parseXmodeValue(tok: Tokens.Token): string {
        switch (tok.type) {
            case TokenType.Symbol:  return tok.name;
            case TokenType.Integer: return tok.value;
            default:
                throw new ParserError(`XMODE setting expected, got ${tokenToString(tok)}`, tok);
        }
    }

    private parseInstruction(head: StatementHead, operands: Tokens.Token | undefined): Nodes.InstructionStatement {
        // mnemonics without operands treat everything behind them as remarks
        if (!operands || this.opts.operandFreeMnemonics?.has(head.operation)) {
            return this.finishBare({ type: NodeType.Instruction, ...this.headFields(head), mnemonic: head.operation, operands: [] });
        }

        const storageOperands = this.commonParser.parseList(tok => this.parseStorageOperand(tok), operands);
        return this.finishOperands({
            type: NodeType.Instruction,
            ...this.headFields(head),
            mnemonic: head.operation,
            operands: storageOperands,
        });
    }

    private parseStorageOperand(first: Tokens.Token): Nodes.StorageOperand {
        const expr = this.exprParser.parseExpr(first);

        const open = this.lexer.next();
        if (!this.commonParser.isChar(open, "(")) {
            this.lexer.unget(open);
            return { type: NodeType.StorageOperand, expr, extent: expr.extent };
        }

        const subfields: (Nodes.Expression | undefined)[] = [];
        let tok = this.lexer.next();
        if (this.commonParser.isChar(tok, ",")) {
            // D(,B)
            subfields.push(undefined);
            subfields.push(this.exprParser.parseExpr());
        } else {
            subfields.push(this.exprParser.parseExpr(tok));
            tok = this.lexer.next();
            if (this.commonParser.isChar(tok, ",")) {
                subfields.push(this.exprParser.parseExpr());
            } else {
                this.lexer.unget(tok);
            }
        }
        const close = this.commonParser.expectChar(")");

        return {
            type: NodeType.StorageOperand,
            expr: expr,
            subfields: subfields,
            extent: calcExtent(first, close),
        };
    }

    private requireOperands(head: StatementHead, operands: Tokens.Token | undefined): Tokens.Token {
        if (!operands) {
            throw new ParserError(`${head.operation} needs operands`, head.opTok);
        }
        return operands;
    }

    private headFields(head: StatementHead) {
        return {
            label: head.label,
            operation: head.operation,
            source: head.source,
            extent: calcExtent(head.first, head.opTok),
        };
    }

    private mkComment(tok: Tokens.Token, source: string): Nodes.CommentStatement {
        return {
            type: NodeType.Comment,
            operation: "",
            source: source,
            extent: tok.extent,
        };
    }

    // statement without operands: the rest of the line is remarks
    private finishBare<T extends Nodes.Statement>(stmt: T): T {
        this.finishLine();
        return stmt;
    }

    // operands must be followed by a blank or the end of the line
    private finishOperands<T extends Nodes.Statement>(stmt: T): T {
        const tok = this.lexer.next();
        if (!this.commonParser.isFieldEnd(tok)) {
            throw new ParserError(`Unexpected ${tokenToString(tok)} after operands`, tok);
        }
        this.lexer.unget(tok);
        this.finishLine();
        return stmt;
    }

    private finishLine() {
        this.lexer.ignoreCurrentLine();
    }
}
