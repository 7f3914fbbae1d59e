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

import { Assembler, AssemblerOptions } from "./assembler/Assembler.js";
import { AssemblyResult } from "./assembler/AssemblyResult.js";
import { Program } from "./parser/nodes/Node.js";

export type AsmaOptions = AssemblerOptions;

/**
 * Assembles a set of source files into one image.
 */
export class Asma {
    private asm: Assembler;

    public constructor(opts: AsmaOptions = {}) {
        this.asm = new Assembler(opts);
    }

    public addInput(name: string, content: string): Program {
        return this.asm.parseInput(name, content);
    }

    public run(): AssemblyResult {
        return this.asm.assembleAll();
    }
}
