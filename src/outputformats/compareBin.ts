import { numToHex } from "../utils/Strings.js";

/**
 * Print every byte that differs between our image and a reference image.
 * @returns true if both are identical
 */
export function compareBin(name: string, ours: Uint8Array, other: Uint8Array): boolean {
    let good = true;

    const len = Math.max(ours.length, other.length);
    for (let i = 0; i < len; i++) {
        const ourVal = ours.at(i);
        const otherVal = other.at(i);
        if (ourVal !== otherVal) {
            good = false;
            const addrStr = numToHex(i, 6);
            const ourStr = ourVal !== undefined ? numToHex(ourVal, 2) : "none";
            const otherStr = otherVal !== undefined ? numToHex(otherVal, 2) : "none";
            console.log(`${addrStr}: our ${ourStr} != other ${otherStr} in ${name}`);
        }
    }

    return good;
}
