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
import { Content } from "./Content.js";
import { Region } from "./Region.js";

/**
 * All regions in declaration order. The image bytes are the regions' bytes
 * concatenated without gaps.
 */
export class Image extends Content<Region> {
    // displacement of every region and section into the image
    public locateAll() {
        this.current = 0;
        for (const region of this.elements) {
            region.imageOffset = this.current;
            for (const section of region.children()) {
                if (section.loc.kind != "absolute") {
                    throw new InternalError(`${section.describe()} is not bound`);
                }
                section.imageOffset = this.current + (section.loc.value - region.start);
            }
            this.alloc(region.length);
        }
    }

    protected offsetOf(child: Region): number {
        if (child.imageOffset === undefined) {
            throw new InternalError(`${child.describe()} was not located in the image`);
        }
        return child.imageOffset;
    }
}
