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

import { formatValue } from "../image/Address.js";
import { normalizeSymbolName } from "../utils/Strings.js";
import { SymbolAttributes, SymbolData, SymbolType, SymbolValue } from "./SymbolData.js";

export type SymbolTableFailure = "duplicate" | "undefined" | "image";

export class SymbolTableError extends Error {
    public readonly reason: SymbolTableFailure;
    public readonly symbol: string;

    public constructor(reason: SymbolTableFailure, symbol: string) {
        super(SymbolTableError.describe(reason, symbol));
        this.name = SymbolTableError.name;
        this.reason = reason;
        this.symbol = symbol;
    }

    public static redefined(existing: SymbolData): SymbolTableError {
        return new SymbolTableError(existing.value.type == SymbolType.Image ? "image" : "duplicate", existing.name);
    }

    private static describe(reason: SymbolTableFailure, symbol: string): string {
        switch (reason) {
            case "duplicate":   return `Symbol ${symbol} already defined`;
            case "undefined":   return `Symbol ${symbol} not defined`;
            case "image":       return `Symbol ${symbol} is the name of the image`;
        }
    }
}

export class SymbolTable {
    private symbols = new Map<string, SymbolData>();

    public constructor(private caseSensitive: boolean) {
    }

    public normalize(name: string): string {
        return normalizeSymbolName(name, this.caseSensitive);
    }

    public define(name: string, value: SymbolValue, attributes: SymbolAttributes, stmtNo: number): SymbolData {
        const normName = this.normalize(name);
        const existing = this.symbols.get(normName);
        if (existing) {
            const noChange = this.sameValue(existing.value, value);
            if (noChange) {
                return existing;
            }
            throw SymbolTableError.redefined(existing);
        }

        const sym: SymbolData = {
            name: normName,
            value: value,
            attributes: { ...attributes },
            definedAt: stmtNo,
            references: [],
        };
        this.symbols.set(normName, sym);
        return sym;
    }

    // additive and idempotent per statement
    public reference(name: string, stmtNo: number) {
        const sym = this.tryLookup(name);
        if (sym && !sym.references.includes(stmtNo)) {
            sym.references.push(stmtNo);
        }
    }

    public tryLookup(name: string): SymbolData | undefined {
        return this.symbols.get(this.normalize(name));
    }

    public lookup(name: string): SymbolData {
        const sym = this.tryLookup(name);
        if (sym === undefined) {
            throw new SymbolTableError("undefined", this.normalize(name));
        }
        return sym;
    }

    public getSymbols(): ReadonlyMap<string, SymbolData> {
        return this.symbols;
    }

    private sameValue(a: SymbolValue, b: SymbolValue): boolean {
        switch (a.type) {
            case SymbolType.Section:    return b.type == SymbolType.Section && a.sectionId == b.sectionId;
            case SymbolType.Region:     return b.type == SymbolType.Region && a.regionId == b.regionId;
            case SymbolType.Image:      return b.type == SymbolType.Image;
            case SymbolType.Label:      return b.type == SymbolType.Label && a.binaryId == b.binaryId;
            case SymbolType.Equate:
                return b.type == SymbolType.Equate && a.value !== undefined && b.value !== undefined &&
                    formatValue(a.value) == formatValue(b.value);
        }
    }
}

