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
import { Address, AddressError, relative } from "./Address.js";
import { Binary, checkTransition, Located } from "./Binary.js";
import { Container } from "./Content.js";

/**
 * Control section (CSECT) or dummy section (DSECT).
 */
export class Section extends Container<Binary> implements Located {
    public readonly dummy: boolean;
    public readonly alignment = 8;
    public owner?: number;
    public loc: Address;

    // set when an allocation failed, later statements in here can't be trusted
    public failed = false;

    public constructor(id: number, name: string, dummy: boolean) {
        super(id, name);
        this.dummy = dummy;
        this.loc = relative(id, 0, dummy);
    }

    public size(): number {
        return this.length;
    }

    public setLocation(addr: Address) {
        checkTransition(this.describe(), this.loc, addr);
        this.loc = addr;
    }

    // move the cursor without touching the high-water mark
    public org(offset: number) {
        if (offset < 0) {
            throw new AddressError(`ORG before start of ${this.describe()}`);
        }
        this.current = this.base + offset;
    }

    public orgHighWater() {
        this.current = this.base + this.length;
    }

    public makeAbsolute() {
        if (this.dummy) {
            throw new InternalError(`${this.describe()} can't be bound to memory`);
        } else if (this.loc.kind != "absolute") {
            throw new InternalError(`${this.describe()} was not positioned`);
        }

        for (const binary of this.elements) {
            // statements behind a failed allocation never got a location
            if (!binary.loc && this.failed) {
                continue;
            }
            binary.makeAbsolute(this.loc.value);
        }
    }

    public materialize(): Uint8Array | undefined {
        if (this.failed) {
            return undefined;
        }
        return this.insert();
    }

    public override describe(): string {
        const kind = this.dummy ? "DSECT" : "CSECT";
        return this.name ? `${kind} ${this.name}` : `unnamed ${kind}`;
    }

    protected locate(cursor: number): Address {
        return relative(this.id, cursor, this.dummy);
    }

    protected offsetOf(child: Binary): number {
        const loc = child.loc;
        if (!loc) {
            throw new InternalError(`Binary ${child.id} in ${this.describe()} was never positioned`);
        }

        switch (loc.kind) {
            case "relative":
                return loc.offset - this.base;
            case "absolute":
                if (this.loc.kind != "absolute") {
                    throw new InternalError(`Absolute binary in unbound ${this.describe()}`);
                }
                return loc.value - this.loc.value;
        }
    }
}
