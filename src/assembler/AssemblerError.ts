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

import { HasExtent } from "../lexer/Cursor.js";
import { CodeError } from "../utils/CodeError.js";

/**
 * A single statement could not be assembled.
 */
export class AssemblerError extends CodeError {
    // number of the failing statement, if known
    public stmtNo?: number;

    public constructor(msg: string, node: HasExtent) {
        const cursor = node.extent.cursor;
        super(msg, cursor.inputName, cursor.lineIdx + 1, cursor.colIdx + 1);
        this.name = AssemblerError.name;
    }
}

/**
 * Allocation failed, so no address behind the failing statement in
 * the same section can be trusted.
 */
export class ContainerAllocationError extends AssemblerError {
    public readonly section: string;

    public constructor(msg: string, node: HasExtent, section: string) {
        super(`${msg}, giving up on ${section}`, node);
        this.name = ContainerAllocationError.name;
        this.section = section;
    }
}
