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

import { Xmode } from "./Xmode.js";

export type TargetName = "s360-20" | "s360" | "s370" | "e390" | "s390x";
export type Architecture = "360" | "370" | "390" | "z";

export const TargetNames: readonly TargetName[] = ["s360-20", "s360", "s370", "e390", "s390x"];
export const ArchitectureLevels: readonly Architecture[] = ["360", "370", "390", "z"];

// base register with a hardware-defined anchor
export interface DirectRegister {
    register: number;
    anchor: number;
}

export interface TargetSpec {
    name: TargetName;
    architecture: Architecture;
    addressWidth: number;
    directRegisters: readonly DirectRegister[];
    xmode: Readonly<Xmode>;     // formats of PSW and CCW
}

// the 360 model 20 treats registers 0 to 7 as 4K pages of storage
const Model20Directs: DirectRegister[] = [0, 1, 2, 3, 4, 5, 6, 7].map(r => ({ register: r, anchor: r * 0x1000 }));
const RegisterZero: DirectRegister[] = [{ register: 0, anchor: 0 }];

export const Targets: Record<TargetName, TargetSpec> = {
    "s360-20":  { name: "s360-20",  architecture: "360",    addressWidth: 16,   directRegisters: Model20Directs,    xmode: { psw: "PSWS" } },
    "s360":     { name: "s360",     architecture: "360",    addressWidth: 24,   directRegisters: RegisterZero,      xmode: { psw: "PSW360", ccw: 0 } },
    "s370":     { name: "s370",     architecture: "370",    addressWidth: 24,   directRegisters: RegisterZero,      xmode: { psw: "PSWBC", ccw: 0 } },
    "e390":     { name: "e390",     architecture: "390",    addressWidth: 31,   directRegisters: RegisterZero,      xmode: { psw: "PSWE390", ccw: 1 } },
    "s390x":    { name: "s390x",    architecture: "z",      addressWidth: 64,   directRegisters: RegisterZero,      xmode: { psw: "PSWZ", ccw: 1 } },
};

export function parseTargetName(name: string): TargetName {
    const lower = name.toLowerCase();
    const target = TargetNames.find(t => t == lower);
    if (!target) {
        throw Error(`Unknown target '${name}', expected one of ${TargetNames.join(", ")}`);
    }
    return target;
}

export function supportsArchitecture(target: TargetSpec, required: Architecture): boolean {
    return ArchitectureLevels.indexOf(required) <= ArchitectureLevels.indexOf(target.architecture);
}
