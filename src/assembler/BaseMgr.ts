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

import { absolute, Address, formatValue } from "../image/Address.js";
import { DirectRegister } from "../isa/Targets.js";

export interface BaseRegisterAssignment {
    register: number;
    anchor: Address;
    sectionId?: number;
    direct: boolean;
}

export interface BaseResolution {
    register: number;
    displacement: number;
}

interface Candidate {
    assignment: BaseRegisterAssignment;
    displacement: number;
}

export class NoBaseAvailableError extends Error {
    public readonly target: Address;

    public constructor(target: Address) {
        super(`No base register available for ${formatValue(target)}`);
        this.name = NoBaseAvailableError.name;
        this.target = target;
    }
}

/**
 * Active base register assignments and base-displacement resolution.
 */
export class BaseMgr {
    public static readonly NumRegisters = 16;

    private directs: BaseRegisterAssignment[];
    private usings = new Map<number, BaseRegisterAssignment>();

    public constructor(directRegisters: readonly DirectRegister[]) {
        this.directs = directRegisters.map(d => ({
            register: BaseMgr.checkRegister(d.register),
            anchor: absolute(d.anchor),
            direct: true,
        }));
    }

    // a new assignment replaces any previous one for the same register
    public assign(register: number, anchor: Address) {
        BaseMgr.checkRegister(register);
        this.usings.set(register, {
            register: register,
            anchor: anchor,
            sectionId: anchor.kind == "relative" ? anchor.sectionId : undefined,
            direct: false,
        });
    }

    public drop(register: number) {
        BaseMgr.checkRegister(register);
        this.usings.delete(register);
    }

    public dropAll() {
        this.usings.clear();
    }

    // assigned registers shadow direct ones
    public active(): BaseRegisterAssignment[] {
        const res = [...this.usings.values()];
        for (const direct of this.directs) {
            if (!this.usings.has(direct.register)) {
                res.push(direct);
            }
        }
        return res.sort((a, b) => a.register - b.register);
    }

    public resolve(target: Address, fieldBits: number): BaseResolution {
        const limit = 2 ** fieldBits;
        const candidates: Candidate[] = [];
        for (const assignment of this.active()) {
            const displacement = BaseMgr.displacement(assignment.anchor, target);
            if (displacement === undefined || displacement >= limit) {
                continue;
            }
            candidates.push({ assignment, displacement });
        }

        if (candidates.length == 0) {
            throw new NoBaseAvailableError(target);
        }

        candidates.sort(BaseMgr.compareCandidates);
        const best = candidates[0];
        return {
            register: best.assignment.register,
            displacement: best.displacement,
        };
    }

    /**
     * Smallest displacement first. On a tie, assigned registers beat direct ones,
     * the highest assigned register wins and the lowest direct register wins.
     */
    private static compareCandidates(a: Candidate, b: Candidate): number {
        if (a.displacement != b.displacement) {
            return a.displacement - b.displacement;
        }

        const aDirect = a.assignment.direct;
        const bDirect = b.assignment.direct;
        if (aDirect != bDirect) {
            return aDirect ? 1 : -1;
        } else if (aDirect) {
            return a.assignment.register - b.assignment.register;
        } else {
            return b.assignment.register - a.assignment.register;
        }
    }

    // target - anchor if both are in the same domain and the anchor is not behind the target
    private static displacement(anchor: Address, target: Address): number | undefined {
        let disp: number;
        if (anchor.kind == "absolute" && target.kind == "absolute") {
            disp = target.value - anchor.value;
        } else if (anchor.kind == "relative" && target.kind == "relative" && anchor.sectionId == target.sectionId) {
            disp = target.offset - anchor.offset;
        } else {
            return undefined;
        }
        return disp >= 0 ? disp : undefined;
    }

    private static checkRegister(register: number): number {
        if (!Number.isInteger(register) || register < 0 || register >= BaseMgr.NumRegisters) {
            throw Error(`Invalid register ${register}`);
        }
        return register;
    }
}
