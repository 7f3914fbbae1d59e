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

import { Binary } from "../image/Binary.js";
import { Region } from "../image/Region.js";
import { Section } from "../image/Section.js";
import { PswFormat } from "../isa/PswBuilder.js";
import { CcwFormat } from "../isa/Xmode.js";
import * as Nodes from "../parser/nodes/Node.js";
import { AssemblerError } from "./AssemblerError.js";

export enum StatementState {
    Parsed,
    EarlyResolved,
    Allocated,
    Bound,
    ObjectGenerated,
    Consolidated,
    Errored,
}

// one operand of DC or DS
export interface DataItem {
    operand: Nodes.DataOperand;
    binary: Binary;
    duplication?: number;
    itemLength?: number;
    valueCount?: number;
}

export interface StatementRecord {
    readonly stmtNo: number;
    readonly node: Nodes.Statement;
    state: StatementState;

    // comments, listing control and everything behind END
    ignore: boolean;

    // deferred expressions left after the last resolution attempt
    pending: boolean;

    // content of instructions and CCWs, zero-length marker of directives
    binary?: Binary;
    items: DataItem[];

    // format of PSW and CCW statements after applying XMODE
    pswFormat?: PswFormat;
    ccwFormat?: CcwFormat;

    // containers opened by START, REGION, CSECT and DSECT
    region?: Region;
    section?: Section;

    error?: AssemblerError;
}

export function binariesOf(rec: StatementRecord): Binary[] {
    const res: Binary[] = [];
    if (rec.binary) {
        res.push(rec.binary);
    }
    for (const item of rec.items) {
        res.push(item.binary);
    }
    return res;
}

export function isLive(rec: StatementRecord): boolean {
    return !rec.ignore && rec.state != StatementState.Errored;
}
