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

import { AssemblyResult, RegionInfo } from "../assembler/AssemblyResult.js";
import { numToHex } from "../utils/Strings.js";

export const IplControlFile = "IMAGE.ipl";

export interface IplFile {
    name: string;
    content: Uint8Array | string;
}

export function regionFileName(region: RegionInfo, index: number): string {
    return `${region.name || `REGION${index}`}.bin`;
}

/**
 * Files for a list-directed IPL: one binary per region plus the control file
 * that names each binary with its load address.
 */
export function writeIplFiles(result: AssemblyResult): IplFile[] {
    const files: IplFile[] = [];
    let control = "";
    result.regions.forEach((region, i) => {
        const name = regionFileName(region, i);
        files.push({ name: name, content: region.bytes });
        control += `${name} 0x${numToHex(region.start, 1)}\n`;
    });
    files.push({ name: IplControlFile, content: control });
    return files;
}
