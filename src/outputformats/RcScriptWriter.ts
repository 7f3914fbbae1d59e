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

import { AssemblyResult } from "../assembler/AssemblyResult.js";
import { bytesToHex, numToHex } from "../utils/Strings.js";

// the r command alters at most this many bytes
export const RcChunkSize = 16;

/**
 * Storage alter commands for an emulator's RC script, one "r ADDR=DATA" per chunk.
 */
export function writeRcScript(result: AssemblyResult): string {
    let script = "";
    for (const region of result.regions) {
        for (let offset = 0; offset < region.bytes.length; offset += RcChunkSize) {
            const chunk = region.bytes.subarray(offset, offset + RcChunkSize);
            script += `r ${numToHex(region.start + offset, 1)}=${bytesToHex(chunk)}\n`;
        }
    }
    return script;
}
