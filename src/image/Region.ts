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

import { InternalError } from "../utils/InternalError.js";
import { absolute, AbsoluteAddress, Address } from "./Address.js";
import { checkTransition, Located } from "./Binary.js";
import { Container } from "./Content.js";
import { Section } from "./Section.js";

/**
 * Sections bound to one contiguous range of memory.
 */
export class Region extends Container<Section> implements Located {
    public readonly alignment = 1;
    public owner?: number;
    public loc?: Address;

    // start address as requested by START or REGION
    public requestedStart?: number;

    public size(): number {
        return this.length;
    }

    public get start(): number {
        if (this.loc?.kind != "absolute") {
            throw new InternalError(`${this.describe()} was not positioned`);
        }
        return this.loc.value;
    }

    public get end(): number {
        return this.start + this.length;
    }

    public isPositioned(): boolean {
        return this.loc !== undefined;
    }

    public setLocation(addr: Address) {
        if (addr.kind != "absolute") {
            throw new InternalError(`${this.describe()} needs an absolute start`);
        }
        this.position(addr.value);
    }

    public position(start: number) {
        const loc = absolute(start);
        checkTransition(this.describe(), this.loc, loc);
        this.loc = loc;
        this.base = start;
        this.current = start;
    }

    // convert the addresses of all control sections and their contents
    public bindAll() {
        for (const section of this.elements) {
            section.makeAbsolute();
        }
    }

    public materialize(): Uint8Array {
        return this.insert();
    }

    public override describe(): string {
        return this.name ? `region ${this.name}` : "unnamed region";
    }

    protected locate(cursor: number): AbsoluteAddress {
        if (!this.loc) {
            throw new InternalError(`Assigning sections in unpositioned ${this.describe()}`);
        }
        return absolute(cursor);
    }

    protected offsetOf(child: Section): number {
        if (child.loc.kind != "absolute") {
            throw new InternalError(`${child.describe()} is not bound`);
        }
        return child.loc.value - this.start;
    }
}
