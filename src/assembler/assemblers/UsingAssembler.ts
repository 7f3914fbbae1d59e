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

import { displace } from "../../image/Address.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { SubComponents } from "../Assembler.js";
import { Context } from "../Context.js";
import { StatementRecord } from "../Statement.js";
import { ExprEvaluator } from "../util/ExprEvaluator.js";

// bytes covered by one base register with a 12-bit displacement
export const BaseRange = 4096;

/**
 * Assembler for USING and DROP. Runs in source order during object generation
 * so every instruction sees the assignments that precede it.
 */
export class UsingAssembler {
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.evaluator = components.evaluator;
    }

    // USING anchor,r1,r2,...: each further register covers the next 4K
    public handleUsing(ctx: Context, rec: StatementRecord, stmt: Nodes.UsingStatement) {
        const anchor = this.evaluator.safeAddress(ctx, stmt.anchor, rec.stmtNo);
        stmt.registers.forEach((regExpr, i) => {
            const reg = this.evaluator.safeInteger(ctx, regExpr, rec.stmtNo);
            ctx.baseMgr.assign(reg, displace(anchor, i * BaseRange));
        });
    }

    public handleDrop(ctx: Context, rec: StatementRecord, stmt: Nodes.DropStatement) {
        if (stmt.registers.length == 0) {
            ctx.baseMgr.dropAll();
            return;
        }

        for (const regExpr of stmt.registers) {
            ctx.baseMgr.drop(this.evaluator.safeInteger(ctx, regExpr, rec.stmtNo));
        }
    }
}
