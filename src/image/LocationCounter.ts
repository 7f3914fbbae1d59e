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

import { Address, displace } from "./Address.js";

/**
 * The current location, i.e. the value of *.
 */
export class LocationCounter {
    private anchor?: Address;
    private displacement = 0;

    public establish(addr: Address) {
        this.anchor = addr;
        this.displacement = 0;
    }

    public increment(bytes: number) {
        this.displacement += bytes;
    }

    public reset() {
        this.anchor = undefined;
        this.displacement = 0;
    }

    public isEstablished(): boolean {
        return this.anchor !== undefined;
    }

    public current(): Address | undefined {
        if (!this.anchor) {
            return undefined;
        }

        return displace(this.anchor, this.displacement);
    }
}
