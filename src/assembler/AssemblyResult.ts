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

import { Value } from "../image/Address.js";
import { CodeError } from "../utils/CodeError.js";
import { StatementRecord } from "./Statement.js";
import { SymbolData } from "./SymbolData.js";

export interface SectionInfo {
    name: string;
    dummy: boolean;
    failed: boolean;
    length: number;
    address?: number;       // memory address of control sections
    imageOffset?: number;
}

export interface RegionInfo {
    name: string;
    start: number;
    length: number;
    imageOffset: number;
    sections: SectionInfo[];
    bytes: Uint8Array;
}

/**
 * Everything the output writers need from an assembly.
 */
export interface AssemblyResult {
    imageName: string;
    image: Uint8Array;
    load: number;
    entry: number;
    regions: RegionInfo[];
    dsects: SectionInfo[];
    errors: readonly CodeError[];
    symbols: ReadonlyMap<string, SymbolData>;
    symbolValues: ReadonlyMap<string, Value>;
    statements: readonly StatementRecord[];
}
