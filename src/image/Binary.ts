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
import { Address, formatValue, makeAbsolute } from "./Address.js";

/**
 * Anything that can be placed inside a container.
 */
export interface Located {
    readonly id: number;
    readonly alignment: number;
    owner?: number;
    loc?: Address;

    size(): number;
    setLocation(addr: Address): void;
    materialize(): Uint8Array | undefined;
}

// a relative location must never replace an absolute one
export function checkTransition(name: string, from: Address | undefined, to: Address) {
    if (from?.kind == "absolute" && to.kind == "relative") {
        throw new InternalError(`${name} at ${formatValue(from)} can't become relative again`);
    }
}

/**
 * Bytes of a single statement or data operand.
 */
export class Binary implements Located {
    public readonly id: number;
    public readonly alignment: number;
    public owner?: number;
    public loc?: Address;
    private len?: number;
    private bytes?: Uint8Array;

    public constructor(id: number, alignment: number, length?: number) {
        this.id = id;
        this.alignment = alignment;
        this.len = length;
    }

    public get length(): number | undefined {
        return this.len;
    }

    public setLength(length: number) {
        if (this.loc) {
            throw new InternalError(`Binary ${this.id} changes length after being positioned`);
        } else if (length < 0 || !Number.isInteger(length)) {
            throw new InternalError(`Invalid length ${length} for binary ${this.id}`);
        }
        this.len = length;
    }

    public hasLength(): boolean {
        return this.len !== undefined;
    }

    public size(): number {
        if (this.len === undefined) {
            throw new InternalError(`Length of binary ${this.id} not known yet`);
        }
        return this.len;
    }

    public setLocation(addr: Address) {
        checkTransition(`Binary ${this.id}`, this.loc, addr);
        this.loc = addr;
    }

    public makeAbsolute(sectionStart: number) {
        if (!this.loc) {
            throw new InternalError(`Binary ${this.id} was never positioned`);
        }
        this.loc = makeAbsolute(this.loc, sectionStart);
    }

    public build(bytes: Uint8Array) {
        if (!this.loc) {
            throw new InternalError(`Building binary ${this.id} before it was positioned`);
        } else if (bytes.length != this.size()) {
            throw new InternalError(`Binary ${this.id} built with ${bytes.length} bytes instead of ${this.size()}`);
        }
        this.bytes = bytes;
    }

    public isBuilt(): boolean {
        return this.bytes !== undefined;
    }

    public materialize(): Uint8Array | undefined {
        return this.bytes;
    }
}
