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

import { Arena } from "../../image/Arena.js";
import { Binary } from "../../image/Binary.js";
import { encodePsw, pswAlignment, pswLength } from "../../isa/PswBuilder.js";
import { applyXmode, XmodeError } from "../../isa/Xmode.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { InternalError } from "../../utils/InternalError.js";
import { SubComponents } from "../Assembler.js";
import { AssemblerError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { StatementRecord } from "../Statement.js";
import { Deferred, ExprEvaluator, isDeferred } from "../util/ExprEvaluator.js";
import { SectionAssembler } from "./SectionAssembler.js";
import { SymbolAssembler } from "./SymbolAssembler.js";

/**
 * Assembler for XMODE and the program status word directives.
 */
export class PswAssembler {
    private arena: Arena;
    private evaluator: ExprEvaluator;
    private sections: SectionAssembler;
    private symbols: SymbolAssembler;

    public constructor(components: SubComponents, sections: SectionAssembler, symbols: SymbolAssembler) {
        this.arena = components.arena;
        this.evaluator = components.evaluator;
        this.sections = sections;
        this.symbols = symbols;
    }

    // takes effect for the statements that follow
    public handleXmode(ctx: Context, stmt: Nodes.XmodeStatement) {
        try {
            applyXmode(ctx.xmode, stmt.mode, stmt.setting);
        } catch (e) {
            if (!(e instanceof XmodeError)) {
                throw e;
            }
            throw new AssemblerError(e.message, stmt);
        }
    }

    public parsePsw(ctx: Context, rec: StatementRecord, stmt: Nodes.PswStatement) {
        const format = stmt.format ?? ctx.xmode.psw;
        if (!format) {
            throw new AssemblerError("PSW needs an XMODE PSW setting", stmt);
        }
        rec.pswFormat = format;

        const length = pswLength(format);
        const binary = this.arena.newBinary(pswAlignment(format), length);
        rec.binary = binary;
        this.sections.place(ctx, rec, binary);
        this.symbols.defineLabel(rec, binary, length);
    }

    public resolveOperands(ctx: Context, rec: StatementRecord, stmt: Nodes.PswStatement): Deferred | undefined {
        for (const expr of this.operands(stmt)) {
            const res = this.evaluator.tryEval(ctx, expr, rec.stmtNo);
            if (isDeferred(res)) {
                return res;
            }
        }
        return undefined;
    }

    public generatePsw(ctx: Context, rec: StatementRecord, stmt: Nodes.PswStatement, binary: Binary) {
        if (!rec.pswFormat) {
            throw new InternalError(`PSW format of statement ${rec.stmtNo} not set`);
        }

        const fields = {
            system: this.evaluator.safeInteger(ctx, stmt.system, rec.stmtNo),
            key: this.evaluator.safeInteger(ctx, stmt.key, rec.stmtNo),
            mode: this.evaluator.safeInteger(ctx, stmt.mode, rec.stmtNo),
            program: this.evaluator.safeInteger(ctx, stmt.program, rec.stmtNo),
            address: this.evaluator.safeAbsolute(ctx, stmt.address, rec.stmtNo),
            amode: stmt.amode ? this.evaluator.safeInteger(ctx, stmt.amode, rec.stmtNo) : undefined,
        };
        binary.build(encodePsw(rec.pswFormat, fields));
    }

    private operands(stmt: Nodes.PswStatement): Nodes.Expression[] {
        const exprs = [stmt.system, stmt.key, stmt.mode, stmt.program, stmt.address];
        return stmt.amode ? [...exprs, stmt.amode] : exprs;
    }
}
