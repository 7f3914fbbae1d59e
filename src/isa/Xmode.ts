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

import { PswFormat, PswFormats } from "./PswBuilder.js";

export type CcwFormat = 0 | 1;

// format of the generic PSW and CCW directives, undefined disables them
export interface Xmode {
    psw?: PswFormat;
    ccw?: CcwFormat;
}

export class XmodeError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = XmodeError.name;
    }
}

const PswSettings = new Map<string, PswFormat | undefined>([
    ...PswFormats.map(f => [f, f] as const),
    ...PswFormats.map(f => [f.substring(3), f] as const),
    ["NONE", undefined],
]);

const CcwSettings = new Map<string, CcwFormat | undefined>([
    ["0", 0],
    ["1", 1],
    ["CCW0", 0],
    ["CCW1", 1],
    ["NONE", undefined],
]);

/**
 * Change one XMODE setting, e.g. PSW to E390 or CCW to 1.
 */
export function applyXmode(xmode: Xmode, mode: string, setting: string) {
    const upperMode = mode.toUpperCase();
    const upperSetting = setting.toUpperCase();
    switch (upperMode) {
        case "PSW":
            if (!PswSettings.has(upperSetting)) {
                throw new XmodeError(`XMODE PSW setting invalid: ${setting}`);
            }
            xmode.psw = PswSettings.get(upperSetting);
            break;
        case "CCW":
            if (!CcwSettings.has(upperSetting)) {
                throw new XmodeError(`XMODE CCW setting invalid: ${setting}`);
            }
            xmode.ccw = CcwSettings.get(upperSetting);
            break;
        default:
            throw new XmodeError(`XMODE mode not recognized: ${mode}`);
    }
}
