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

import { Value } from "../image/Address.js";

export enum SymbolType {
    Section,    // CSECT or DSECT
    Region,     // REGION or START with address
    Image,      // the whole image, defined at bind
    Label,      // label of a statement with a binary
    Equate,     // X EQU value
}

export type SymbolValue = SectionValue | RegionValue | ImageValue | LabelValue | EquateValue;

export interface SectionValue {
    type: SymbolType.Section;
    sectionId: number;
}

export interface RegionValue {
    type: SymbolType.Region;
    regionId: number;
}

export interface ImageValue {
    type: SymbolType.Image;
}

export interface LabelValue {
    type: SymbolType.Label;
    binaryId: number;
}

export interface EquateValue {
    type: SymbolType.Equate;
    value?: Value; // until resolved
}

// I image, R region, C control section, D dummy section, A address, L integer
export type TypeCode = "I" | "R" | "C" | "D" | "A" | "L";

export interface SymbolAttributes {
    L?: number;     // length, once known
    S: number;      // scale
    I: number;      // integer count
    T: TypeCode;
    M?: number;     // displacement into the image, set at bind
}

export interface SymbolData {
    readonly name: string;
    value: SymbolValue;
    attributes: SymbolAttributes;
    readonly definedAt: number;
    readonly references: number[];
}
