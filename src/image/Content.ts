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
import { roundUp } from "../utils/Strings.js";
import { Address } from "./Address.js";
import { Located } from "./Binary.js";

/**
 * Ordered, exclusively owned children plus the allocation cursor.
 * The length is the high-water mark of the cursor relative to the base.
 */
export abstract class Content<C extends Located> {
    public readonly id: number;
    public readonly name: string;
    public imageOffset?: number;
    protected elements: C[] = [];
    protected base = 0;
    protected current = 0;
    private highWater = 0;
    private frozen = false;
    private bytes?: Uint8Array;

    public constructor(id: number, name: string) {
        this.id = id;
        this.name = name;
    }

    public get length(): number {
        return this.highWater;
    }

    public get cursor(): number {
        return this.current;
    }

    public children(): readonly C[] {
        return this.elements;
    }

    public isFrozen(): boolean {
        return this.frozen;
    }

    public append(child: C) {
        if (this.frozen) {
            throw new InternalError(`Appending to frozen ${this.describe()}`);
        } else if (child.owner !== undefined) {
            throw new InternalError(`Child ${child.id} already belongs to container ${child.owner}`);
        }
        child.owner = this.id;
        this.elements.push(child);
    }

    public align(alignment: number) {
        this.current = this.base + roundUp(this.current - this.base, alignment);
    }

    public alloc(size: number) {
        this.current += size;
        this.highWater = Math.max(this.highWater, this.current - this.base);
    }

    public freeze() {
        this.frozen = true;
    }

    // materialize children bottom-up and copy them to their offsets
    public insert(): Uint8Array {
        const bytes = new Uint8Array(this.length);
        for (const child of this.elements) {
            if (child.size() == 0) {
                continue;
            }

            const data = child.materialize();
            if (data) {
                bytes.set(data, this.offsetOf(child));
            }
        }
        this.bytes = bytes;
        return bytes;
    }

    public getBytes(): Uint8Array | undefined {
        return this.bytes;
    }

    public describe(): string {
        return `${this.constructor.name} '${this.name}'`;
    }

    protected abstract offsetOf(child: C): number;
}

/**
 * Content that hands out addresses to its children.
 */
export abstract class Container<C extends Located> extends Content<C> {
    public assign(child: C) {
        if (child.owner !== this.id) {
            throw new InternalError(`Assigning foreign child ${child.id} in ${this.describe()}`);
        }
        this.align(child.alignment);
        child.setLocation(this.locate(this.current));
        this.alloc(child.size());
    }

    public assignAll() {
        for (const child of this.elements) {
            this.assign(child);
        }
    }

    protected abstract locate(cursor: number): Address;
}
