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
import { numToHex } from "../utils/Strings.js";

/**
 * Offset into a section. Addresses of control sections become absolute when
 * their region is bound, dummy section addresses stay relative.
 */
export interface RelativeAddress {
    kind: "relative";
    sectionId: number;
    offset: number;
    dummy: boolean;
    length?: number;
}

export interface AbsoluteAddress {
    kind: "absolute";
    value: number;
    length?: number;
}

export type Address = RelativeAddress | AbsoluteAddress;

// result of evaluating an expression
export type Value = number | Address;

export class AddressError extends Error {
    public constructor(msg: string) {
        super(msg);
        this.name = AddressError.name;
    }
}

export function relative(sectionId: number, offset: number, dummy: boolean, length?: number): RelativeAddress {
    if (offset < 0) {
        throw new AddressError(`Negative offset ${offset} in section`);
    }
    return { kind: "relative", sectionId, offset, dummy, length };
}

export function absolute(value: number, length?: number): AbsoluteAddress {
    if (value < 0) {
        throw new AddressError(`Negative address ${value}`);
    }
    return { kind: "absolute", value, length };
}

export function isAddress(val: Value): val is Address {
    return typeof val != "number";
}

/**
 * Turn a control section offset into a memory address, given where the section starts.
 * This is a one-way transition: absolute addresses and dummy section offsets are rejected.
 */
export function makeAbsolute(addr: Address, sectionStart: number): AbsoluteAddress {
    if (addr.kind == "absolute") {
        throw new InternalError(`Address ${formatValue(addr)} is already absolute`);
    } else if (addr.dummy) {
        throw new InternalError(`Dummy section offset ${formatValue(addr)} can't become absolute`);
    }
    return absolute(sectionStart + addr.offset, addr.length);
}

export function withLength<T extends Address>(addr: T, length: number | undefined): T {
    return { ...addr, length };
}

// the value where an integer is required; dummy section offsets count as plain displacements
export function toInteger(val: Value): number {
    if (!isAddress(val)) {
        return val;
    } else if (val.kind == "relative" && val.dummy) {
        return val.offset;
    }
    throw new AddressError(`Expected an integer, got address ${formatValue(val)}`);
}

export function displace(addr: Address, disp: number): Address {
    switch (addr.kind) {
        case "relative":    return relative(addr.sectionId, addr.offset + disp, addr.dummy, addr.length);
        case "absolute":    return absolute(addr.value + disp, addr.length);
    }
}

export function addValues(lhs: Value, rhs: Value): Value {
    if (!isAddress(lhs) && !isAddress(rhs)) {
        return lhs + rhs;
    } else if (!isAddress(rhs)) {
        return displace(lhs, rhs);
    } else if (!isAddress(lhs)) {
        return displace(rhs, lhs);
    }
    throw new AddressError(`Can't add addresses ${formatValue(lhs)} and ${formatValue(rhs)}`);
}

export function subValues(lhs: Value, rhs: Value): Value {
    if (!isAddress(rhs)) {
        return isAddress(lhs) ? displace(lhs, -rhs) : lhs - rhs;
    } else if (!isAddress(lhs)) {
        throw new AddressError(`Can't subtract address ${formatValue(rhs)} from integer`);
    }

    if (lhs.kind == "absolute" && rhs.kind == "absolute") {
        return lhs.value - rhs.value;
    } else if (lhs.kind == "relative" && rhs.kind == "relative") {
        if (lhs.sectionId != rhs.sectionId) {
            throw new AddressError(`Addresses ${formatValue(lhs)} and ${formatValue(rhs)} are in different sections`);
        }
        return lhs.offset - rhs.offset;
    }
    throw new AddressError(`Can't subtract ${formatValue(rhs)} from ${formatValue(lhs)}: mixed relative and absolute`);
}

export function mulValues(lhs: Value, rhs: Value): number {
    return toInteger(lhs) * toInteger(rhs);
}

export function divValues(lhs: Value, rhs: Value): number {
    const divisor = toInteger(rhs);
    if (divisor == 0) {
        return 0;
    }
    return Math.trunc(toInteger(lhs) / divisor);
}

export function formatValue(val: Value): string {
    if (!isAddress(val)) {
        return `${val}`;
    }

    switch (val.kind) {
        case "relative":    return `${val.dummy ? "D" : "S"}${val.sectionId}+${numToHex(val.offset, 1)}`;
        case "absolute":    return numToHex(val.value, 6);
    }
}
