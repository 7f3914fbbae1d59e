#!/usr/bin/env node
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

import { command, flag, number, option, optional, restPositionals, run, string } from "cmd-ts";
import { closeSync, mkdirSync, openSync, readFileSync, writeFileSync } from "fs";
import { basename, join } from "path";
import { Asma, AsmaOptions } from "../src/Asma.js";
import { parseTargetName, TargetNames } from "../src/isa/Targets.js";
import { applyXmode, Xmode } from "../src/isa/Xmode.js";
import { writeIplFiles } from "../src/outputformats/IplWriter.js";
import { writeListing } from "../src/outputformats/ListingWriter.js";
import { writeRcScript } from "../src/outputformats/RcScriptWriter.js";
import { compareBin } from "../src/outputformats/compareBin.js";
import { dumpAst } from "../src/parser/nodes/dumpAst.js";
import { formatCodeError } from "../src/utils/CodeError.js";

// eslint-disable-next-line max-lines-per-function
const cmd = command({
    name: "asma",
    description: "Cross-assembler for S/360, S/370, ESA/390 and z/Architecture",
    args: {
        target: option({
            long: "target",
            short: "t",
            description: `Target system, one of ${TargetNames.join(", ")}`,
            type: optional(string),
        }),
        addressWidth: option({
            long: "address-width",
            description: "Maximum address width in bits",
            type: optional(number),
        }),
        psw: option({
            long: "psw",
            description: "Format of the PSW directive, overrides the target's XMODE PSW",
            type: optional(string),
        }),
        ccw: option({
            long: "ccw",
            description: "Format of the CCW directive, 0 or 1, overrides the target's XMODE CCW",
            type: optional(string),
        }),
        caseSensitive: flag({
            long: "case-sensitive",
            description: "Treat symbols as case-sensitive",
        }),
        failFast: flag({
            long: "fail-fast",
            description: "Stop at the first error",
        }),
        trace: flag({
            long: "trace",
            description: "Trace the assembly phases",
        }),
        imageName: option({
            long: "image-name",
            description: "Name of the image symbol",
            type: optional(string),
        }),
        outputAst: flag({
            long: "write-ast",
            short: "a",
            description: "Write abstract syntax tree",
        }),
        imageFile: option({
            long: "image",
            short: "o",
            description: "Write the image to this file",
            type: optional(string),
        }),
        rcFile: option({
            long: "rc",
            description: "Write an RC script with storage alter commands",
            type: optional(string),
        }),
        iplDir: option({
            long: "ipl",
            description: "Write list-directed IPL files into this directory",
            type: optional(string),
        }),
        listingFile: option({
            long: "listing",
            short: "l",
            description: "Write the assembly listing",
            type: optional(string),
        }),
        compareWith: option({
            long: "compare",
            short: "c",
            description: "Compare image with given binary file",
            type: optional(string),
        }),
        files: restPositionals({
            description: "Input source files",
            displayName: "sources",
            type: string,
        }),
    },

    handler: (args) => {
        if (args.files.length == 0) {
            console.error("No sources given");
            process.exit(-1);
        }

        const files = args.files;

        const opts: AsmaOptions = {};
        try {
            opts.target = args.target !== undefined ? parseTargetName(args.target) : undefined;
            const xmode: Xmode = {};
            if (args.psw !== undefined) {
                applyXmode(xmode, "PSW", args.psw);
            }
            if (args.ccw !== undefined) {
                applyXmode(xmode, "CCW", args.ccw);
            }
            opts.xmode = xmode;
        } catch (e) {
            console.error(e instanceof Error ? e.message : String(e));
            process.exit(-1);
        }
        opts.addressWidth = args.addressWidth;
        opts.caseSensitive = args.caseSensitive;
        opts.failFast = args.failFast;
        opts.imageName = args.imageName;
        if (args.trace) {
            opts.trace = line => console.log(line);
        }

        const asma = new Asma(opts);
        for (const file of files) {
            const src = readFileSync(file, "utf-8");
            const ast = asma.addInput(file, src);
            if (args.outputAst) {
                const astFile = openSync(basename(file) + ".ast.txt", "w");
                dumpAst(ast, line => writeFileSync(astFile, line + "\n"));
                closeSync(astFile);
            }
        }

        const output = asma.run();

        // the listing shows the errors, so write it in any case
        if (args.listingFile) {
            const lines: string[] = [];
            writeListing(output, line => lines.push(line));
            writeFileSync(args.listingFile, lines.join("\n") + "\n");
        }

        if (output.errors.length > 0) {
            output.errors.forEach(e => console.error(formatCodeError(e)));
            process.exit(-1);
        }

        const lastName = files[files.length - 1];
        const imageFile = args.imageFile ?? basename(lastName) + ".bin";
        writeFileSync(imageFile, output.image);
        console.log(`Wrote ${output.image.length} bytes, load ${output.load.toString(16)}, entry ${output.entry.toString(16)}`);

        if (args.rcFile) {
            writeFileSync(args.rcFile, writeRcScript(output));
        }

        if (args.iplDir) {
            mkdirSync(args.iplDir, { recursive: true });
            for (const file of writeIplFiles(output)) {
                writeFileSync(join(args.iplDir, file.name), file.content);
            }
        }

        if (args.compareWith) {
            const otherBin = readFileSync(args.compareWith);
            const name = basename(args.compareWith);
            if (compareBin(name, output.image, otherBin)) {
                console.log("No differences");
            } else {
                process.exit(-1);
            }
        }

        process.exit(0);
    }
});

void run(cmd, process.argv.slice(2));
