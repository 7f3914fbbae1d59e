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
import { Address, makeAbsolute } from "./Address.js";
import { Binary } from "./Binary.js";
import { Image } from "./Image.js";
import { Region } from "./Region.js";
import { Section } from "./Section.js";

/**
 * Owner of every container of one assembly. Symbols and statements refer
 * to containers by id and resolve them here.
 */
export class Arena {
    public readonly image: Image;
    private binaries: Binary[] = [];
    private sections: Section[] = [];
    private regions: Region[] = [];

    public constructor(imageName: string) {
        this.image = new Image(0, imageName);
    }

    public newBinary(alignment: number, length?: number): Binary {
        const binary = new Binary(this.binaries.length, alignment, length);
        this.binaries.push(binary);
        return binary;
    }

    public newSection(name: string, dummy: boolean): Section {
        const section = new Section(this.sections.length, name, dummy);
        this.sections.push(section);
        return section;
    }

    public newRegion(name: string): Region {
        const region = new Region(this.regions.length, name);
        this.regions.push(region);
        this.image.append(region);
        return region;
    }

    public binary(id: number): Binary {
        const binary = this.binaries[id];
        if (!binary) {
            throw new InternalError(`Unknown binary ${id}`);
        }
        return binary;
    }

    public section(id: number): Section {
        const section = this.sections[id];
        if (!section) {
            throw new InternalError(`Unknown section ${id}`);
        }
        return section;
    }

    public region(id: number): Region {
        const region = this.regions[id];
        if (!region) {
            throw new InternalError(`Unknown region ${id}`);
        }
        return region;
    }

    public allSections(): readonly Section[] {
        return this.sections;
    }

    public allRegions(): readonly Region[] {
        return this.regions;
    }

    // section containing a binary, if it was appended to one
    public sectionOf(binary: Binary): Section | undefined {
        return binary.owner !== undefined ? this.section(binary.owner) : undefined;
    }

    /**
     * Bring a control section offset to its memory address once its section is bound.
     * Dummy section offsets and unbound sections are returned unchanged.
     */
    public absolutize(addr: Address): Address {
        if (addr.kind == "absolute" || addr.dummy) {
            return addr;
        }

        const section = this.section(addr.sectionId);
        if (section.loc.kind != "absolute") {
            return addr;
        }
        return makeAbsolute(addr, section.loc.value);
    }
}
