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

import { Arena } from "../image/Arena.js";
import { Region } from "../image/Region.js";
import { Section } from "../image/Section.js";
import { Xmode } from "../isa/Xmode.js";
import { LocationCounter } from "../image/LocationCounter.js";
import { AssemblerError } from "./AssemblerError.js";
import { BaseMgr } from "./BaseMgr.js";
import { StatementRecord } from "./Statement.js";

export type PhaseName =
    "parse" | "early-resolve" | "early-resolve-retry" | "allocate" |
    "bind" | "object-generate" | "consolidate" | "finish";

export const PhaseOrder: readonly PhaseName[] = [
    "parse", "early-resolve", "early-resolve-retry", "allocate",
    "bind", "object-generate", "consolidate", "finish",
];

export interface EntryPoint {
    address: number;
    source: "END" | "ENTRY";
}

/**
 * Mutable state of one assembly, handed to every phase and sub-assembler.
 */
export class Context {
    public readonly arena: Arena;
    public readonly location = new LocationCounter();
    public readonly baseMgr: BaseMgr;
    public readonly errors: AssemblerError[] = [];

    public phase: PhaseName = "parse";
    public currentRegion?: Region;
    public currentSection?: Section;
    public unnamedRegion?: Region;
    public unnamedSection?: Section;

    // region of the first START, gives the load point
    public loadRegion?: Region;
    public entry?: EntryPoint;
    public ended = false;

    // changed by XMODE while parsing
    public readonly xmode: Xmode;

    // statement that opened each region, for diagnostics
    public readonly regionOrigins = new Map<number, StatementRecord>();

    public constructor(arena: Arena, baseMgr: BaseMgr, xmode: Readonly<Xmode>) {
        this.arena = arena;
        this.baseMgr = baseMgr;
        this.xmode = { ...xmode };
    }

    // true once all control sections have memory addresses
    public get bound(): boolean {
        return PhaseOrder.indexOf(this.phase) >= PhaseOrder.indexOf("bind");
    }

    public startPhase(phase: PhaseName) {
        this.phase = phase;
        this.location.reset();
    }
}
