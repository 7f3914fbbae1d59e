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

// EBCDIC code page 037, printable characters only
const Punctuation: Record<string, number> = {
    " ": 0x40, ".": 0x4B, "<": 0x4C, "(": 0x4D, "+": 0x4E, "|": 0x4F,
    "&": 0x50, "!": 0x5A, "$": 0x5B, "*": 0x5C, ")": 0x5D, ";": 0x5E,
    "¬": 0x5F, "-": 0x60, "/": 0x61, ",": 0x6B, "%": 0x6C, "_": 0x6D,
    ">": 0x6E, "?": 0x6F, "`": 0x79, ":": 0x7A, "#": 0x7B, "@": 0x7C,
    "'": 0x7D, "=": 0x7E, "\"": 0x7F, "~": 0xA1, "^": 0xB0, "[": 0xBA,
    "]": 0xBB, "{": 0xC0, "}": 0xD0, "\\": 0xE0,
};

// zone start for letters A-I, J-R and S-Z
const LetterRanges: [string, string, number][] = [
    ["A", "I", 0xC1], ["J", "R", 0xD1], ["S", "Z", 0xE2],
    ["a", "i", 0x81], ["j", "r", 0x91], ["s", "z", 0xA2],
];

export const EbcdicSpace = 0x40;

export function asciiCharToEbcdic(chr: string): number {
    const punct = Punctuation[chr];
    if (punct !== undefined) {
        return punct;
    }

    if (chr >= "0" && chr <= "9") {
        return 0xF0 + (chr.charCodeAt(0) - 0x30);
    }

    for (const [first, last, code] of LetterRanges) {
        if (chr >= first && chr <= last) {
            return code + (chr.charCodeAt(0) - first.charCodeAt(0));
        }
    }

    throw Error(`Character '${chr}' has no EBCDIC representation`);
}

export function asciiStringToEbcdic(text: string): Uint8Array {
    const res = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
        res[i] = asciiCharToEbcdic(text[i]);
    }
    return res;
}
