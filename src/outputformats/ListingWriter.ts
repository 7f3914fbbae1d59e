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

import { AssemblyResult } from "../assembler/AssemblyResult.js";
import { binariesOf, StatementRecord } from "../assembler/Statement.js";
import { SymbolData, SymbolType } from "../assembler/SymbolData.js";
import { Address, isAddress, Value } from "../image/Address.js";
import { formatCodeError } from "../utils/CodeError.js";
import { bytesToHex, numToHex } from "../utils/Strings.js";

// object bytes shown per listing line
export const ListingObjectBytes = 8;

function formatLocation(loc: Address | undefined): string {
    if (!loc) {
        return "".padEnd(6);
    }
    return numToHex(loc.kind == "absolute" ? loc.value : loc.offset, 6);
}

function formatSymbolValue(val: Value | undefined): string {
    if (val === undefined) {
        return "".padEnd(8);
    } else if (!isAddress(val)) {
        return numToHex(val < 0 ? val + 2 ** 32 : val, 8);
    }
    return numToHex(val.kind == "absolute" ? val.value : val.offset, 8);
}

function statementObject(rec: StatementRecord): Uint8Array {
    const parts = binariesOf(rec).map(b => b.materialize() ?? new Uint8Array(0));
    const res = new Uint8Array(Math.min(ListingObjectBytes, parts.reduce((acc, p) => acc + p.length, 0)));
    let pos = 0;
    for (const part of parts) {
        if (pos >= res.length) {
            break;
        }
        const piece = part.subarray(0, res.length - pos);
        res.set(piece, pos);
        pos += piece.length;
    }
    return res;
}

function symbolType(sym: SymbolData): string {
    switch (sym.value.type) {
        case SymbolType.Section:    return sym.attributes.T == "D" ? "DSECT" : "CSECT";
        case SymbolType.Region:     return "REGION";
        case SymbolType.Image:      return "IMAGE";
        case SymbolType.Label:      return "LABEL";
        case SymbolType.Equate:     return "EQU";
    }
}

/**
 * Source listing with location and object code of every statement,
 * followed by the symbol cross-reference and the errors.
 */
export function writeListing(result: AssemblyResult, write: (line: string) => void) {
    write("LOC    OBJECT CODE       STMT  SOURCE");
    for (const rec of result.statements) {
        const loc = rec.ignore ? undefined : binariesOf(rec)[0]?.loc;
        const obj = bytesToHex(statementObject(rec));
        write(`${formatLocation(loc)} ${obj.padEnd(ListingObjectBytes * 2)}  ${String(rec.stmtNo).padStart(5)} ${rec.node.source}`.trimEnd());
    }

    write("");
    write("SYMBOL                           TYPE     VALUE    LENGTH  DEFN  REFERENCES");
    const symbols = [...result.symbols.values()].sort((a, b) => a.name.localeCompare(b.name));
    for (const sym of symbols) {
        const value = formatSymbolValue(result.symbolValues.get(sym.name));
        const length = String(sym.attributes.L ?? "").padStart(6);
        const refs = sym.references.join(" ");
        write(`${sym.name.padEnd(32)} ${symbolType(sym).padEnd(8)} ${value} ${length}  ${String(sym.definedAt).padStart(4)}  ${refs}`.trimEnd());
    }

    if (result.errors.length > 0) {
        write("");
        write(`${result.errors.length} errors`);
        result.errors.forEach(e => write(formatCodeError(e)));
    }
}
